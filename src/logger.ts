import pino from "pino";

/**
 * PINs and their hashes never reach log output, wherever they appear in a
 * log object.
 */
const REDACTION_PATHS = [
  "pin",
  "pinHash",
  "*.pin",
  "*.pinHash",
  "params.pin",
  "account.pinHash",
];

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino.
 *
 * Level comes from `LOG_LEVEL` unless `options.level` is given.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || "info",
    base: { service: "bank-ledger" },
    redact: {
      paths: REDACTION_PATHS,
      censor: "[REDACTED]",
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}
