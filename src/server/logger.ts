/**
 * Logging and counters for the mergedesk server
 *
 * One JSON object per line in production (or with LOG_FORMAT=json),
 * a coloured single line otherwise. Tests only see fatal entries.
 */

import { randomUUID } from 'crypto';
import type { Context, MiddlewareHandler } from 'hono';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFields = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

/**
 * Lowest level written for an environment: LOG_LEVEL when it names a level,
 * otherwise info in production, fatal under test and debug elsewhere
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (isLogLevel(env.LOG_LEVEL)) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'production') return 'info';
  if (env.NODE_ENV === 'test') return 'fatal';
  return 'debug';
}

const threshold = SEVERITY[levelFromEnv(process.env)];
const jsonOutput = process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json';

const ANSI: Record<LogLevel | 'dim' | 'reset', string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

function prettyLine(level: LogLevel, message: string, fields: LogFields): string {
  const { service, ...rest } = fields;
  const time = new Date().toISOString().slice(11, 23);
  const scope = typeof service === 'string' ? ` (${service})` : '';
  const extra = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');

  return `${ANSI.dim}${time}${ANSI.reset} ${ANSI[level]}${level.padEnd(5)}${ANSI.reset}${scope} ${message}${
    extra ? ` ${ANSI.dim}${extra}${ANSI.reset}` : ''
  }`;
}

export class Logger {
  constructor(private readonly fields: LogFields = {}) {}

  child(fields: LogFields): Logger {
    return new Logger({ ...this.fields, ...fields });
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  fatal(message: string, fields?: LogFields): void {
    this.write('fatal', message, fields);
  }

  /**
   * Returns a callback that logs `label` at debug with the elapsed time
   */
  time(label: string): () => void {
    const started = Date.now();
    return () => this.debug(label, { duration: Date.now() - started });
  }

  /**
   * Like `time`, at info and with extra fields
   */
  startTimer(message: string, fields?: LogFields): { end: () => void } {
    const started = Date.now();
    return { end: () => this.info(message, { ...fields, duration: Date.now() - started }) };
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (SEVERITY[level] < threshold) return;

    const merged = { ...this.fields, ...fields };
    const line = jsonOutput
      ? JSON.stringify({ level, time: new Date().toISOString(), message, ...merged })
      : prettyLine(level, message, merged);

    if (SEVERITY[level] >= SEVERITY.error) {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger({ service: 'mergedesk' });

// =============================================================================
// Request logging
// =============================================================================

declare module 'hono' {
  interface ContextVariableMap {
    logger: Logger;
    traceId: string;
  }
}

/**
 * Gives every request a trace id (reusing an incoming x-trace-id) and a
 * child logger, and logs the outcome
 */
export function requestLogger(options: { skip?: (c: Context) => boolean } = {}): MiddlewareHandler {
  return async (c, next) => {
    if (options.skip?.(c)) {
      return next();
    }

    const traceId = c.req.header('x-trace-id') ?? randomUUID();
    const log = logger.child({ traceId, method: c.req.method, path: c.req.path });
    const started = Date.now();

    c.header('x-trace-id', traceId);
    c.set('traceId', traceId);
    c.set('logger', log);

    try {
      await next();
    } catch (error) {
      log.error('Request threw', {
        duration: Date.now() - started,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const status = c.res.status;
    const fields = { status, duration: Date.now() - started };
    if (status >= 500) {
      log.error('Request failed', fields);
    } else if (status >= 400) {
      log.warn('Request rejected', fields);
    } else {
      log.info('Request completed', fields);
    }
  };
}

// =============================================================================
// Counters and gauges
// =============================================================================

type Labels = Record<string, string>;

function seriesKey(name: string, labels?: Labels): string {
  const pairs = Object.entries(labels ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${value}"`);
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
}

export class Metrics {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  inc(name: string, by = 1, labels?: Labels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  set(name: string, value: number, labels?: Labels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  /**
   * Text exposition format, one TYPE line per metric name
   */
  render(): string {
    const lines: string[] = [];
    const section = (series: Map<string, number>, type: 'counter' | 'gauge') => {
      const typed = new Set<string>();
      for (const [key, value] of series) {
        const name = key.split('{')[0] ?? key;
        if (!typed.has(name)) {
          lines.push(`# TYPE ${name} ${type}`);
          typed.add(name);
        }
        lines.push(`${key} ${value}`);
      }
    };

    section(this.counters, 'counter');
    section(this.gauges, 'gauge');
    return lines.join('\n');
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
  }
}

export const metrics = new Metrics();

export function metricsHandler(c: Context): Response {
  return c.text(metrics.render());
}
