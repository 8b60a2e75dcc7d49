export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

type LogSink = (line: string) => void;

/**
 * Minimal leveled logger. Everything goes to stderr so stdout stays free for
 * rendered investigation output.
 */
export class Logger {
  private sink: LogSink;

  constructor(
    private level: LogLevel = 'info',
    sink?: LogSink
  ) {
    this.sink = sink ?? ((line) => process.stderr.write(`${line}\n`));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const prefix = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    const suffix = formatMeta(meta);
    this.sink(suffix ? `${prefix} ${suffix}` : prefix);
  }
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return meta.stack ?? meta.message;
  }
  if (typeof meta === 'string') {
    return meta;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}
