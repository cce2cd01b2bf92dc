import {
  Inject,
  Injectable,
  LoggerService,
  OnApplicationShutdown,
} from '@nestjs/common';
import * as winston from 'winston';
import ledgerConfig, { LedgerConfig } from '../../config/ledger.config';

/**
 * Diagnostic logger. Writes JSON lines to a file so the interactive
 * terminal stays clean; the audit trail lives in the history log instead.
 */
@Injectable()
export class LedgerLoggerService implements LoggerService, OnApplicationShutdown {
  private readonly logger: winston.Logger;

  constructor(@Inject(ledgerConfig.KEY) config: LedgerConfig) {
    const fileTransport = new winston.transports.File({
      filename: config.logFile,
      level: config.logLevel,
    });

    this.logger = winston.createLogger({
      level: config.logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports: [fileTransport],
    });
  }

  log(message: string, context?: string) {
    this.logger.info({ message, context });
  }

  error(message: string, trace?: string, context?: string) {
    this.logger.error({ message, trace, context });
  }

  warn(message: string, context?: string) {
    this.logger.warn({ message, context });
  }

  debug(message: string, context?: string) {
    this.logger.debug({ message, context });
  }

  verbose(message: string, context?: string) {
    this.logger.verbose({ message, context });
  }

  onApplicationShutdown() {
    this.logger.end();
  }
}
