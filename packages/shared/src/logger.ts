import winston from "winston";

export type Logger = winston.Logger;

export type LoggerOptions = {
  level?: string;
  service?: string;
  silent?: boolean;
};

/**
 * JSON lines on stdout. Messages are snake_case event names; everything else
 * goes in the metadata object.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    defaultMeta: { service: options.service ?? "showing-desk" },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [new winston.transports.Console()]
  });
}

export function withRequestContext(logger: Logger, requestId: string): Logger {
  return logger.child({ request_id: requestId });
}
