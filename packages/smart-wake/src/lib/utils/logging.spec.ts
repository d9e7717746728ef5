import { createLogger } from './logging';

describe('createLogger', () => {
  let info: jest.SpyInstance;
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('tags lines with the scope and the current session', () => {
    let sessionId: string | undefined = 'session-1';
    const logger = createLogger({ logging: 'info' }, 'monitor', () => sessionId);

    logger.info('Sampling started');
    sessionId = undefined;
    logger.warn('Idle', 42);

    expect(info).toHaveBeenCalledWith('[smart-wake][monitor][session-1] Sampling started');
    expect(warn).toHaveBeenCalledWith('[smart-wake][monitor] Idle', 42);
  });

  it('uses the bare prefix without a scope', () => {
    createLogger({ logging: 'info' }).info('ready');

    expect(info).toHaveBeenCalledWith('[smart-wake] ready');
  });

  it('drops levels below the threshold', () => {
    const logger = createLogger({ logging: 'warn' }, 'host');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('writes nothing when silent', () => {
    const context = jest.fn(() => 'session-1');
    const logger = createLogger({ logging: 'silent' }, 'host', context);

    logger.warn('hidden');

    expect(warn).not.toHaveBeenCalled();
    expect(context).not.toHaveBeenCalled();
  });
});
