import pino, { type Logger, type LoggerOptions, type DestinationStream } from "pino";

export type { Logger };

type CreateLoggerOptions = {
  name?: string;
  level?: string;
  /** Extra fields stamped on every line, e.g. `{ service: "api" }`. */
  bindings?: Record<string, string>;
  destination?: DestinationStream;
};

function resolveTransport(): LoggerOptions["transport"] {
  if (process.env.NODE_ENV !== "development") {
    return undefined;
  }
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      singleLine: true,
      translateTime: "SYS:HH:MM:ss.l"
    }
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: options.name ?? "agro-news",
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    base: { pid: process.pid, ...options.bindings },
    // Errors are logged under `error` (and `reason` for rejections), not pino's `err`.
    serializers: {
      error: pino.stdSerializers.err,
      reason: pino.stdSerializers.err
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }

  return pino({ ...loggerOptions, transport: resolveTransport() });
}
