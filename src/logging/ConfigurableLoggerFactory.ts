import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Orchestrator log file pattern; no file transport when omitted. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Strip path prefixes from labels. */
  showLocation?: boolean;
  /** Drop all output, used by tests. */
  silent?: boolean;
}

/**
 * Logger factory for the orchestrator's own output: colorized console plus
 * an optional daily-rotated file shared by every logger it creates.
 */
export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly silent: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    this.silent = options.silent ?? false;
    if (options.fileName && !this.silent) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared across all loggers.
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      silent: this.silent,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.runId) {
          info.runId = store.runId;
        }
        return info;
      })(),
      format.printf(({ level, message, label: labelInner, timestamp, runId }: TransformableInfo): string => {
        const runInfo = typeof runId === 'string' ? ` [run:${runId}]` : '';
        return `${timestamp}${runInfo} [${this.displayLabel(labelInner)}] ${level}: ${message}`;
      }),
    );
  }

  private displayLabel(label: unknown): string {
    const text = typeof label === 'string' ? label : String(label);
    if (!this.showLocation) {
      return text;
    }
    const className = text.split('/').pop();
    return className && className !== 'Object' ? className : text;
  }
}
