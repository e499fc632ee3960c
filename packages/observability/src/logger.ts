import pino from "pino";
import type { DestinationStream, LoggerOptions } from "pino";

export type Logger = pino.Logger;
export type PinoLoggerOptions = LoggerOptions;

export interface LoggerParams {
  env: string;
  level: string;
  service: string;
}

export function createPinoOptions(params: LoggerParams): PinoLoggerOptions {
  return {
    level: params.level,
    base: {
      env: params.env,
      service: params.service,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Failures are logged as `{ error }`; pino only serializes `err` out of the box.
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
}

/** JSON lines to stdout unless a destination is given. */
export function createLogger(params: LoggerParams, destination?: DestinationStream): Logger {
  const options = createPinoOptions(params);
  return destination ? pino(options, destination) : pino(options);
}

export function createSilentLogger(service = "test"): Logger {
  return createLogger({ env: "test", level: "silent", service });
}
