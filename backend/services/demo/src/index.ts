// backend/services/demo/src/index.ts
/**
 * Boot: load env → config → logging → HTTP.
 *
 *   curl localhost:7000/user/1/post/1000
 *   curl "localhost:7000/query-strings-simple/1?filterInt=25&filterStr=hello&filterBool=true"
 *   curl "localhost:7000/query-strings-arrays/1?filterArrInt[]=1&filterArrInt[]=2&filterArrStr[]=hello"
 *   curl -X POST localhost:7000/user/1 -d '{"name":"Ada","age":"27"}'
 */

import path from "node:path";
import { getLogger, loadEnvFiles, makeHttpLogger } from "@bindparams/shared";
import { createApp } from "./app";
import { loadDemoConfig } from "./config";
import { initLogging } from "./log.init";

loadEnvFiles([".env", ".env.local"], {
  allowMissing: true,
  baseDir: path.resolve(__dirname, ".."),
});

const config = loadDemoConfig();
const pinoLogger = initLogging(config.logLevel, config.serviceName);
const log = getLogger({ service: config.serviceName });

process.on("unhandledRejection", (reason) => {
  log.error({ reason }, "unhandled promise rejection");
});

const app = createApp(config, makeHttpLogger(pinoLogger, config.serviceName));

const server = app.listen(config.port, () => {
  log.info({ port: config.port, policy: config.bindPolicy }, "demo service listening");
});

server.on("error", (err) => {
  log.error({ error: log.serializeError(err) }, "demo service failed to start");
  process.exit(1);
});
