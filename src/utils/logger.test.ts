import { Logger } from './logger';

describe('Logger', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages with the tag', () => {
    new Logger('Deribit').info('hello');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('[Deribit] hello');
  });

  it('should only print debug output when verbose', () => {
    const logger = new Logger();
    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();

    logger.setVerbose(true);
    logger.debug('shown');
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('should share verbosity with child loggers', () => {
    const parent = new Logger();
    const child = parent.child('Market');

    parent.setVerbose(true);

    expect(child.isVerbose()).toBe(true);
    child.debug('progress');
    expect(String(log.mock.calls[0][0])).toContain('[Market] progress');
  });
});
