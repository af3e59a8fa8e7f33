// backend/services/demo/src/config.ts

/**
 * Boot config for the demo service.
 * - No dotenv loading here (index.ts loads env files before calling this).
 * - Every variable is optional; a present-but-invalid value fails fast.
 */

import {
  LOG_LEVELS,
  optionalEnum,
  optionalNumber,
  optionalString,
  type BindPolicy,
  type EnvSource,
  type LogLevel,
} from "@bindparams/shared";

export type DemoConfig = {
  serviceName: string;
  serviceVersion: number;
  envLabel: string;
  port: number;
  logLevel: LogLevel;
  bindPolicy: BindPolicy;
};

export function loadDemoConfig(env: EnvSource = process.env): DemoConfig {
  const port = optionalNumber("PORT", 7000, env);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid env var PORT="${port}". Expected 0-65535.`);
  }

  return {
    serviceName: "demo",
    serviceVersion: 1,
    envLabel: optionalString("NODE_ENV", "dev", env),
    port,
    logLevel: optionalEnum("LOG_LEVEL", LOG_LEVELS, "info", env),
    bindPolicy: {
      coercion: optionalEnum("BIND_COERCION", ["lenient", "strict"], "lenient", env),
      unknownQueryKeys: optionalEnum(
        "BIND_UNKNOWN_QUERY_KEYS",
        ["ignore", "reject"],
        "ignore",
        env
      ),
      duplicateScalars: optionalEnum(
        "BIND_DUPLICATE_SCALARS",
        ["first", "reject"],
        "first",
        env
      ),
    },
  };
}
