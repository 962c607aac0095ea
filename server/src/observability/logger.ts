export interface LogContext {
  readonly component?: string;
  readonly requestId?: string;
  readonly userId?: string;
  readonly conversationId?: string;
  readonly [key: string]: unknown;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const SECRET_FIELD = /token|credential|secret|password|authorization|api[_-]?key/i;
const PROVIDER_KEY = /\b(sk-ant-|ant-oa-)[\w-]+/g;
const REDACTED = "[redacted]";

export interface Logger {
  child(context: LogContext): Logger;
  debug(message: string, fields?: LogContext): void;
  info(message: string, fields?: LogContext): void;
  warn(message: string, fields?: LogContext): void;
  error(message: string, fields?: LogContext): void;
}

export interface LoggerOptions {
  /** Emit `debug` records; off unless the DEBUG flag is set. */
  readonly debug?: boolean;
}

export function createLogger(
  context: LogContext = {},
  options: LoggerOptions = {},
): Logger {
  return {
    child(childContext: LogContext): Logger {
      return createLogger(
        {
          ...context,
          ...compact(childContext),
        },
        options,
      );
    },
    debug(message: string, fields?: LogContext): void {
      if (options.debug) {
        writeLog("debug", message, context, fields);
      }
    },
    info(message: string, fields?: LogContext): void {
      writeLog("info", message, context, fields);
    },
    warn(message: string, fields?: LogContext): void {
      writeLog("warn", message, context, fields);
    },
    error(message: string, fields?: LogContext): void {
      writeLog("error", message, context, fields);
    },
  };
}

export function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return {
      error: error.message,
      errorName: error.name,
      stack: error.stack,
    };
  }
  return { error: String(error) };
}

function writeLog(
  level: LogLevel,
  message: string,
  context: LogContext,
  fields?: LogContext,
): void {
  const record = {
    ts: new Date().toISOString(),
    level,
    message: redactText(message),
    ...redact(compact(context)),
    ...redact(compact(fields)),
  };

  const serialized = JSON.stringify(record);
  if (level === "error") {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

function compact(input: LogContext | undefined): LogContext {
  if (!input) {
    return {};
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/** Provider credentials never reach a log line, by field name or by shape. */
function redact(input: LogContext): LogContext {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (SECRET_FIELD.test(key)) {
      result[key] = REDACTED;
    } else if (typeof value === "string") {
      result[key] = redactText(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function redactText(text: string): string {
  return text.replace(PROVIDER_KEY, `$1${REDACTED}`);
}
