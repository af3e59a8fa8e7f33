// backend/services/demo/src/log.init.ts
/**
 * Route the shared logger into pino and return the pino instance for the
 * access logger. Both share one level.
 */

import { pino, type Logger } from "pino";
import {
  setLogLevel,
  setRootLogger,
  type ILogger,
  type LogLevel,
} from "@bindparams/shared";

type Meta = Record<string, unknown>;

// extra positional args ride along under `args`
function withArgs(obj: Meta, rest: unknown[]): Meta {
  return rest.length > 0 ? { ...obj, args: rest } : obj;
}

function pinoRoot(logger: Logger): ILogger {
  return {
    debug: (obj, msg, ...rest) => logger.debug(withArgs(obj, rest), msg),
    info: (obj, msg, ...rest) => logger.info(withArgs(obj, rest), msg),
    warn: (obj, msg, ...rest) => logger.warn(withArgs(obj, rest), msg),
    error: (obj, msg, ...rest) => logger.error(withArgs(obj, rest), msg),
  };
}

export function initLogging(level: LogLevel, serviceName: string): Logger {
  const logger = pino({ name: serviceName, level });
  setRootLogger(pinoRoot(logger));
  setLogLevel(level);
  return logger;
}
