import chalk from 'chalk';
import { defaultLogger, NonJsonLogFormatter } from '../src';

describe('NonJsonLogFormatter', () => {
  const originalConfig = { ...NonJsonLogFormatter.Config };
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
    NonJsonLogFormatter.Config = { ...originalConfig, printTimestamp: false };
  });

  afterEach(() => {
    chalk.level = originalLevel;
    NonJsonLogFormatter.Config = originalConfig;
    jest.restoreAllMocks();
  });

  it('should format level and message as plain parts', () => {
    expect(NonJsonLogFormatter.format({ level: 'WARN', message: 'Something happened' })).toEqual([
      'WARN',
      'Something happened',
    ]);
  });

  it('should append the error and the service name when configured', () => {
    NonJsonLogFormatter.Config.printServiceName = true;
    const error = { name: 'Error', message: 'boom' };

    expect(NonJsonLogFormatter.format({ level: 'ERROR', message: 'Failed', service: 'evaluation', error })).toEqual([
      'ERROR',
      '[evaluation]',
      'Failed',
      error,
    ]);
  });

  it('should skip the level when disabled', () => {
    NonJsonLogFormatter.Config.printLevel = false;

    expect(NonJsonLogFormatter.format({ level: 'INFO', message: 'Hello' })).toEqual(['Hello']);
  });

  it('should print plain lines through the patched logger outside of lambda', () => {
    const consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = defaultLogger({ serviceName: 'logger-test' });

    log.info('Plain output');

    expect(consoleSpy).toHaveBeenCalledWith('INFO', 'Plain output');
  });
});
