import { Injectable, Logger, LoggerService, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RequestContextService } from './request-context.service';

export interface LogContext {
  userId?: string;
  requestId?: string;
  [key: string]: string | number | boolean | readonly string[] | undefined;
}

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/** Levels printed at a LOG_LEVEL threshold; an unknown name means 'log'. */
export const resolveLogLevels = (level: string | undefined): LogLevel[] => {
  const index = LEVELS.findIndex((l) => l === level);
  const cut = index === -1 ? LEVELS.indexOf('log') : index;
  return ['fatal', ...LEVELS.slice(0, cut + 1)];
};

@Injectable()
export class AppLoggerService implements LoggerService {
  private readonly logger = new Logger(AppLoggerService.name);
  private readonly logLevel: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly requestContext: RequestContextService,
  ) {
    this.logLevel = this.configService.get<string>('logging.level', 'log');
  }

  log(message: string, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.log(message, context);
    } else {
      this.logger.log(this.formatMessage(message, context));
    }
  }

  error(message: string, trace?: string, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.error(message, trace, context);
    } else {
      this.logger.error(this.formatMessage(message, context), trace);
    }
  }

  warn(message: string, context?: string | LogContext): void {
    if (typeof context === 'string') {
      this.logger.warn(message, context);
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string, context?: string | LogContext): void {
    if (!this.shouldLog('debug')) return;
    if (typeof context === 'string') {
      this.logger.debug(message, context);
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string | LogContext): void {
    if (!this.shouldLog('verbose')) return;
    if (typeof context === 'string') {
      this.logger.verbose(message, context);
    } else {
      this.logger.verbose(this.formatMessage(message, context));
    }
  }

  /**
   * Security-relevant anomaly (partial revocation, disabled-account login,
   * legacy-store fallback). Always emitted at warn level.
   */
  logSecurity(event: string, context?: LogContext): void {
    this.warn(`SECURITY: ${event}`, {
      ...context,
      type: 'security',
    });
  }

  formatMessage(message: string, context?: LogContext): string {
    const fields = this.requestContext.logFields();
    const enrich: LogContext = {
      ...context,
      requestId: context?.requestId ?? fields.requestId,
      userId: context?.userId ?? fields.userId,
    };

    const contextStr = Object.entries(enrich)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) =>
        `${key}=${Array.isArray(value) ? value.join(',') : String(value)}`,
      )
      .join(' ');

    return contextStr ? `${message} | ${contextStr}` : message;
  }

  private shouldLog(level: LogLevel): boolean {
    return resolveLogLevels(this.logLevel).includes(level);
  }
}
