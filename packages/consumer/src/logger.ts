export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogData = Record<string, unknown>;
type Sink = (line: string) => void;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const stdout: Sink = (line) => {
  process.stdout.write(line);
};

/**
 * JSON-lines logger for the consumer service.
 *
 * Bindings (e.g. `{ component: 'bridge' }`) are repeated on every line of a
 * child logger, so bridge, store and health output can be filtered apart.
 */
export class Logger {
  private readonly threshold: number;

  constructor(
    private readonly level: LogLevel = 'info',
    private readonly sink: Sink = stdout,
    private readonly bindings: LogData = {}
  ) {
    this.threshold = SEVERITY[level];
  }

  /** A logger that shares this one's level and sink and adds `bindings`. */
  child(bindings: LogData): Logger {
    return new Logger(this.level, this.sink, { ...this.bindings, ...bindings });
  }

  debug(msg: string, data?: LogData): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: LogData): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: LogData): void {
    this.write('warn', msg, data);
  }

  /** Log a failure; `err` is flattened with {@link describeError}. */
  error(msg: string, err?: unknown, data?: LogData): void {
    this.write('error', msg, err === undefined ? data : { ...describeError(err), ...data });
  }

  private write(level: LogLevel, msg: string, data?: LogData): void {
    if (SEVERITY[level] < this.threshold) return;
    const line = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
      ...data,
    };
    this.sink(JSON.stringify(line) + '\n');
  }
}

/** Loggable shape of an unknown thrown value. */
export function describeError(err: unknown): LogData {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
