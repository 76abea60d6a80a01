import { ConsoleLogger, Injectable, LogLevel, Optional } from '@nestjs/common';

type Meta = Record<string, unknown>;

/**
 * Console logger that writes one JSON object per line:
 * `{ts, level, context, msg, ...meta}`. Lines go straight to stdout
 * (stderr for errors) so ConsoleLogger's prefix and colours never wrap them.
 * Level filtering still follows setLogLevels().
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(@Optional() context?: string) {
    super(context ?? 'course-catalog');
  }

  private normalizeError(error: unknown): Meta {
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    return { value: String(error) };
  }

  private emit(level: LogLevel, line: string) {
    if (!this.isLevelEnabled(level)) return;
    const stream = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  }

  private toJsonLine(level: string, message: unknown, context: string | undefined, meta: Meta): string {
    const body =
      message instanceof Error
        ? { msg: message.message, error: this.normalizeError(message) }
        : { msg: message };
    return JSON.stringify({ ts: new Date().toISOString(), level, context: context ?? this.context, ...body, ...meta });
  }

  private splitArgs(metaOrContext?: string | Meta): [string | undefined, Meta] {
    return typeof metaOrContext === 'string' ? [metaOrContext, {}] : [undefined, metaOrContext ?? {}];
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: Meta): void;
  log(message: unknown, metaOrContext?: string | Meta) {
    const [context, meta] = this.splitArgs(metaOrContext);
    this.emit('log', this.toJsonLine('info', message, context, meta));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: Meta): void;
  warn(message: unknown, metaOrContext?: string | Meta) {
    const [context, meta] = this.splitArgs(metaOrContext);
    this.emit('warn', this.toJsonLine('warn', message, context, meta));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: Meta): void;
  error(message: unknown, stackOrMeta?: string | Meta, maybeContext?: string) {
    const stack = typeof stackOrMeta === 'string' ? stackOrMeta : undefined;
    const meta = typeof stackOrMeta === 'string' ? {} : (stackOrMeta ?? {});
    this.emit('error', this.toJsonLine('error', message, maybeContext, stack ? { stack, ...meta } : meta));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: Meta): void;
  debug(message: unknown, metaOrContext?: string | Meta) {
    const [context, meta] = this.splitArgs(metaOrContext);
    this.emit('debug', this.toJsonLine('debug', message, context, meta));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: Meta): void;
  verbose(message: unknown, metaOrContext?: string | Meta) {
    const [context, meta] = this.splitArgs(metaOrContext);
    this.emit('verbose', this.toJsonLine('verbose', message, context, meta));
  }
}
