/**
 * Structured logger shared by the stream client packages.
 *
 * Lines follow the `[component] message | {context}` shape used across the
 * client; `configure({ json: true })` switches to one JSON object per line.
 *
 * @example
 * ```ts
 * const log = createLogger('stream');
 * log.info('Connected', { url, epoch: 3 });
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  component: string;
  msg: string;
  context?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  /** Receives every emitted entry; defaults to the console. */
  sink?: (entry: LogEntry, line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

const globalConfig: LoggerConfig = {
  level: levelFromEnv(),
  json: process.env.LOG_FORMAT === 'json',
};

/**
 * Update the process-wide logging defaults. Loggers created with an explicit
 * level keep it.
 */
export function configure(config: Partial<LoggerConfig>): void {
  Object.assign(globalConfig, config);
}

export function getLoggingConfig(): Readonly<LoggerConfig> {
  return globalConfig;
}

function formatLine(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const detail = entry.context && Object.keys(entry.context).length > 0
    ? ` | ${JSON.stringify(entry.context)}`
    : '';
  return `[${entry.component}] ${entry.msg}${detail}`;
}

function writeConsole(entry: LogEntry, line: string): void {
  switch (entry.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

export class Logger {
  private readonly component: string;
  private readonly level?: LogLevel;

  constructor(component: string, options: { level?: LogLevel } = {}) {
    this.component = component;
    this.level = options.level;
  }

  /** Effective level: the logger's own, else the global one. */
  get currentLevel(): LogLevel {
    return this.level ?? globalConfig.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.currentLevel];
  }

  child(suffix: string): Logger {
    return new Logger(`${this.component}:${suffix}`, { level: this.level });
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.write('error', msg, context);
  }

  private write(level: Exclude<LogLevel, 'silent'>, msg: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      msg,
      ...(context ? { context } : {}),
    };
    const line = formatLine(entry, globalConfig.json);
    (globalConfig.sink ?? writeConsole)(entry, line);
  }
}

export function createLogger(component: string, options: { level?: LogLevel } = {}): Logger {
  return new Logger(component, options);
}
