/**
 * Structured logger used by the configuration file loader.
 */

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'nestconf';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'];
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (LEVELS[level] < this._levelValue) return;

    let redactedExtra = extra ?? null;
    if (extra != null && this._redactSensitive) {
      const copy: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(extra)) {
        copy[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
      redactedExtra = copy;
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}
