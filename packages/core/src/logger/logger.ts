export type LogFields = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'debug',
  'info',
  'warn',
  'error',
];

export interface StructuredLogger {
  debug(message: string, ...fields: Array<LogFields>): void;
  info(message: string, ...fields: Array<LogFields>): void;
  warn(message: string, ...fields: Array<LogFields>): void;
  error(message: string, ...fields: Array<LogFields>): void;

  withField(key: string, value: unknown): StructuredLogger;
  withFields(fields: LogFields): StructuredLogger;
  withRequestID(requestId: string): StructuredLogger;
}

export class NoOpLogger implements StructuredLogger {
  debug(_message: string, ..._fields: Array<LogFields>): void {}
  info(_message: string, ..._fields: Array<LogFields>): void {}
  warn(_message: string, ..._fields: Array<LogFields>): void {}
  error(_message: string, ..._fields: Array<LogFields>): void {}

  withField(_key: string, _value: unknown): StructuredLogger {
    return this;
  }

  withFields(_fields: LogFields): StructuredLogger {
    return this;
  }

  withRequestID(_requestId: string): StructuredLogger {
    return this;
  }
}

export interface JsonLoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;
  /** Receives one serialized line per entry, without the trailing newline. */
  write?: (line: string) => void;
  /** Timestamp source, defaults to the current time. */
  now?: () => Date;
  fields?: LogFields;
}

function defaultWrite(line: string): void {
  process.stdout.write(`${line}\n`);
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

/**
 * Writes one JSON object per log entry: `level`, `time`, `msg`, then bound
 * fields and call-site fields (later keys win).
 */
export class JsonLogger implements StructuredLogger {
  private readonly level: LogLevel;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;
  private readonly fields: LogFields;

  constructor(options: JsonLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? defaultWrite;
    this.now = options.now ?? (() => new Date());
    this.fields = { ...options.fields };
  }

  debug(message: string, ...fields: Array<LogFields>): void {
    this.log('debug', message, fields);
  }

  info(message: string, ...fields: Array<LogFields>): void {
    this.log('info', message, fields);
  }

  warn(message: string, ...fields: Array<LogFields>): void {
    this.log('warn', message, fields);
  }

  error(message: string, ...fields: Array<LogFields>): void {
    this.log('error', message, fields);
  }

  withField(key: string, value: unknown): StructuredLogger {
    return this.withFields({ [key]: value });
  }

  withFields(fields: LogFields): StructuredLogger {
    return new JsonLogger({
      level: this.level,
      write: this.write,
      now: this.now,
      fields: { ...this.fields, ...fields },
    });
  }

  withRequestID(requestId: string): StructuredLogger {
    return this.withField('request_id', requestId);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(
    level: LogLevel,
    message: string,
    fields: Array<LogFields>,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogFields = {
      level,
      time: this.now().toISOString(),
      msg: message,
    };
    for (const source of [this.fields, ...fields]) {
      for (const [key, value] of Object.entries(source)) {
        entry[key] = serializeValue(value);
      }
    }

    this.write(JSON.stringify(entry));
  }
}
