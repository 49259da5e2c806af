import type { LogLevel } from '../../config.js';

type Details = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatDetails(details?: Details): string {
  if (!details || Object.keys(details).length === 0) {
    return '';
  }
  return ` | ${JSON.stringify(details)}`;
}

/**
 * Console logger that prefixes each line with the request's correlation id.
 * Use `withRequest` to bind an id once per request.
 */
export class TraceLogger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly requestId?: string
  ) {}

  withRequest(requestId: string): TraceLogger {
    return new TraceLogger(this.level, requestId);
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.log(`${this.prefix()}${message}`);
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.debug(`${this.prefix()}${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(`${this.prefix()}${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) {
      return;
    }
    if (error === undefined) {
      console.error(`${this.prefix()}${message}`);
    } else {
      console.error(`${this.prefix()}${message}`, error);
    }
  }

  operation(name: string, details?: Details): void {
    this.info(`[Operation] ${name}${formatDetails(details)}`);
  }

  database(operation: string, table: string, query?: string): void {
    this.debug(`[DB] ${operation} on '${table}'${query ? ` | ${query}` : ''}`);
  }

  auth(event: string, userIdentifier?: string): void {
    this.info(`[Auth] ${event}${userIdentifier ? ` | User: ${userIdentifier}` : ''}`);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private prefix(): string {
    return this.requestId ? `[${this.requestId}] ` : '';
  }
}
