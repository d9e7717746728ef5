import { InvalidConfigError } from './errors';
import type { BiosignalSource, KeyValueStore, MotionSource, NotificationDispatcher } from './models/collaborators';
import type { SmartWakeConfig, SmartWakePartialConfig } from './models/smart-wake-config';
import { HostCoordinatorService } from './services/host-coordinator.service';
import { MonitorAgentService } from './services/monitor-agent.service';
import { TimeSourceService } from './services/time-source.service';
import type { Logger } from './utils/logging';
import type { TransportAdapter } from './utils/transport';
import { validateConfig } from './validation';

export type SmartWakeConfigInput = SmartWakePartialConfig | (() => SmartWakePartialConfig);

interface NodeProviderOptions {
  config?: SmartWakeConfigInput;
  transport: TransportAdapter;
  store: KeyValueStore;
  notifications: NotificationDispatcher;
  timeSource?: TimeSourceService;
  logger?: Logger;
  /** Reload persisted state before returning. Defaults to true. */
  restore?: boolean;
}

export interface HostProviderOptions extends NodeProviderOptions {
  idFactory?: () => string;
}

export interface MonitorProviderOptions extends NodeProviderOptions {
  biosignal: BiosignalSource;
  motion: MotionSource;
}

function resolveConfig(input: SmartWakeConfigInput | undefined): SmartWakeConfig {
  const partial = typeof input === 'function' ? input() : input;
  const { issues, config } = validateConfig(partial);
  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }
  return config;
}

/**
 * Builds the host coordinator for this process. Construct it once and pass
 * the handle to whatever needs to schedule or answer a wake.
 */
export function provideHostCoordinator(options: HostProviderOptions): HostCoordinatorService {
  const config = resolveConfig(options.config);
  const host = new HostCoordinatorService({
    transport: options.transport,
    store: options.store,
    notifications: options.notifications,
    config,
    timeSource: options.timeSource,
    logger: options.logger,
    idFactory: options.idFactory
  });
  if (options.restore ?? true) {
    host.restore();
  }
  return host;
}

export function provideMonitorAgent(options: MonitorProviderOptions): MonitorAgentService {
  const config = resolveConfig(options.config);
  const monitor = new MonitorAgentService({
    transport: options.transport,
    biosignal: options.biosignal,
    motion: options.motion,
    notifications: options.notifications,
    store: options.store,
    config,
    timeSource: options.timeSource,
    logger: options.logger
  });
  if (options.restore ?? true) {
    monitor.restore();
  }
  return monitor;
}
