import { ConsoleLogger, parseLogLevel } from '../../../src/adapters/sys/ConsoleLogger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('debug logs message and meta when the level allows it', () => {
    const logger = new ConsoleLogger({ level: 'debug' });
    logger.debug('hello', { a: 1 });
    expect(debugSpy).toHaveBeenCalledWith('hello {"a":1}');
  });

  test('messages below the threshold are dropped', () => {
    const logger = new ConsoleLogger({ level: 'warn' });
    logger.debug('noise');
    logger.info('chatter');
    logger.warn('careful');
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('careful');
  });

  test('defaults to info and omits empty meta', () => {
    const logger = new ConsoleLogger();
    logger.debug('hidden');
    logger.info('world', {});
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('world');
  });

  test('child loggers prefix nested scopes', () => {
    const logger = new ConsoleLogger({ scope: 'speech' }).child('synthesizer');
    logger.error('oops', { reason: 'bad' });
    expect(errorSpy).toHaveBeenCalledWith('[speech:synthesizer] oops {"reason":"bad"}');
    expect(logger.level).toBe('info');
  });

  test('parseLogLevel accepts known names and falls back otherwise', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel('error')).toBe('error');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'warn')).toBe('warn');
  });
});
