export * from './lib/models/collaborators';
export * from './lib/models/sample';
export * from './lib/models/smart-wake-config';
export * from './lib/models/smart-wake-event';
export * from './lib/models/stage-estimate';
export * from './lib/models/transport-message';
export * from './lib/models/wake-event';
export * from './lib/models/wake-session';
export * from './lib/defaults';
export * from './lib/errors';
export * from './lib/validation';
export * from './lib/stage-estimator';
export * from './lib/wake-decision-policy';
export * from './lib/provide-smart-wake';
export { HostCoordinatorService, type HostCoordinatorOptions } from './lib/services/host-coordinator.service';
export { MonitorAgentService, type MonitorAgentOptions } from './lib/services/monitor-agent.service';
export { TimeSourceService } from './lib/services/time-source.service';
export { WakeSessionStore, type WakeSessionStoreOptions } from './lib/services/wake-session-store.service';
export { createLogger, createNoopLogger, type Logger } from './lib/utils/logging';
export { createFileStore, createMemoryStore } from './lib/utils/storage';
export {
  createLoopbackLink,
  decodeMessage,
  encodeMessage,
  type LinkDirection,
  type LoopbackLink,
  type LoopbackLinkOptions,
  type TransportAdapter
} from './lib/utils/transport';
export type { MonitoringPoint } from './lib/utils/monitoring-log';
