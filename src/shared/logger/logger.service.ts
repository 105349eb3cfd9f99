import {
  Injectable,
  LoggerService as NestLoggerService,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import winston from 'winston';

/**
 * Nest logger backed by winston.
 *
 * Console output is always on; `error.log` and `combined.log` are written to
 * `LOG_DIR` outside of tests. Everything is silenced under `NODE_ENV=test`.
 */
@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logger: winston.Logger;

  constructor(@Optional() configService?: ConfigService) {
    const nodeEnv =
      configService?.get<string>('app.nodeEnv') ?? process.env.NODE_ENV;
    const level =
      configService?.get<string>('app.logLevel') ??
      process.env.LOG_LEVEL ??
      'debug';
    const logDir =
      configService?.get<string>('app.logDir') ?? process.env.LOG_DIR ?? 'logs';
    const isTest = nodeEnv === 'test';

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, context, trace }) => {
            const scope = context ? ` [${String(context)}]` : '';
            const stack = trace ? `\n${String(trace)}` : '';
            return `${String(timestamp)} ${level}${scope} ${String(message)}${stack}`;
          }),
        ),
      }),
    ];

    if (!isTest) {
      transports.push(
        new winston.transports.File({
          filename: join(logDir, 'error.log'),
          level: 'error',
          format: winston.format.json(),
        }),
        new winston.transports.File({
          filename: join(logDir, 'combined.log'),
          format: winston.format.json(),
        }),
      );
    }

    this.logger = winston.createLogger({
      level,
      silent: isTest,
      format: winston.format.timestamp(),
      transports,
    });
  }

  log(message: unknown, context?: string): void {
    this.logger.info(this.stringify(message), { context });
  }

  error(message: unknown, trace?: unknown, context?: string): void {
    this.logger.error(this.stringify(message), {
      context,
      trace: trace instanceof Error ? trace.stack : trace,
    });
  }

  warn(message: unknown, context?: string): void {
    this.logger.warn(this.stringify(message), { context });
  }

  debug(message: unknown, context?: string): void {
    this.logger.debug(this.stringify(message), { context });
  }

  verbose(message: unknown, context?: string): void {
    this.logger.verbose(this.stringify(message), { context });
  }

  private stringify(message: unknown): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return message.message;
    return JSON.stringify(message);
  }
}
