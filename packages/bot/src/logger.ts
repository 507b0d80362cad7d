export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

/** Flatten an unknown thrown value into log fields. */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}

/**
 * JSON-lines logger. Each entry carries the bound context of the logger
 * that wrote it.
 */
export class Logger {
  private readonly levelName: LogLevel;
  private level: number;
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(
    level: LogLevel = 'info',
    context: Record<string, unknown> = {},
    sink: LogSink = (line) => process.stdout.write(line + '\n')
  ) {
    this.levelName = level;
    this.level = LEVELS[level] ?? LEVELS.info;
    this.context = context;
    this.sink = sink;
  }

  /** Logger sharing level and sink, with extra bound fields. */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.levelName, { ...this.context, ...context }, this.sink);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < this.level) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.context,
      ...data,
    };
    this.sink(JSON.stringify(entry));
  }
}
