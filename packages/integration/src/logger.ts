import { Logger, LogItem } from '@aws-lambda-powertools/logger';
import chalk, { Chalk } from 'chalk';
import { isRunningInLambda } from './environment';

export type LoggerOptions = NonNullable<ConstructorParameters<typeof Logger>[0]>;

const rootLoggerInstance = new Logger({ serviceName: 'resume-screener' });

/**
 * Create a logger with the default configuration without any need to install powertools directly.
 * Created as a child of the root logger so the global configuration (i.e. log level) is inherited.
 * Should be called from the module top-level to cache the logger in the runtime.
 * @param [options] Optional logger configuration
 */
export function defaultLogger(options?: LoggerOptions): Logger {
  return NonJsonLogFormatter.patchIfLocal(rootLoggerInstance.createChild(options));
}

/**
 * Prints powertools log items as colored plain lines instead of JSON documents.
 * JSON output is only useful when the logs are collected by CloudWatch.
 */
export class NonJsonLogFormatter {
  static Config: NonJsonLogFormatterConfig = {
    printLevel: true,
    printTimestamp: true,
    printServiceName: false,
  };

  static LogLevelColors: Record<string, Chalk> = {
    DEBUG: chalk.gray,
    INFO: chalk.green,
    WARN: chalk.yellow,
    ERROR: chalk.red,
    CRITICAL: chalk.bgRed,
    SILENT: chalk.white,
  };

  static patchIfLocal(logger: Logger): Logger {
    if (!isRunningInLambda()) {
      return NonJsonLogFormatter.patchLogger(logger);
    }
    return logger;
  }

  /**
   * Replace the printing function of the powertools logger instance.
   */
  static patchLogger(logger: Logger): Logger {
    Object.defineProperty(logger, 'printLog', {
      value: NonJsonLogFormatter.log,
      configurable: true,
      writable: true,
    });
    return logger;
  }

  /**
   * @param level internal numerical level from powertools, the textual one is part of the attributes
   * @param item log item to print
   */
  static log(level: number, item: LogItem): void {
    item.prepareForPrint();
    console.log(...NonJsonLogFormatter.format(item.getAttributes()));
  }

  static format(attributes: Record<string, unknown>): unknown[] {
    const parts: unknown[] = [];

    if (NonJsonLogFormatter.Config.printTimestamp) {
      parts.push(chalk.cyan(new Date().toISOString()));
    }

    if (NonJsonLogFormatter.Config.printLevel) {
      const level = String(attributes.level ?? 'INFO');
      const color = NonJsonLogFormatter.LogLevelColors[level] ?? chalk.white;
      parts.push(color(level));
    }

    if (NonJsonLogFormatter.Config.printServiceName && attributes.service != null) {
      parts.push(chalk.magenta(`[${String(attributes.service)}]`));
    }

    parts.push(attributes.message);

    if (attributes.error != null) {
      parts.push(attributes.error);
    }

    return parts;
  }
}

export interface NonJsonLogFormatterConfig {
  printTimestamp: boolean;
  printLevel: boolean;
  printServiceName: boolean;
}
