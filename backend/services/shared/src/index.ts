// backend/services/shared/src/index.ts
/**
 * Curated exports (no god-barrel).
 */

// Binding engine
export { field } from "./bind/dsl/field";
export type {
  FieldDescriptor,
  FieldsShape,
  InferFields,
  ScalarKind,
} from "./bind/dsl/types";
export {
  bindInto,
  defineHandler,
  into,
  type BindableHandler,
  type BindingSignature,
  type HandlerArgs,
  type HandlerFn,
  type Outputs,
} from "./bind/into";
export {
  BindError,
  CoercionError,
  ConfigurationError,
  DecodeError,
  QueryPolicyError,
} from "./bind/errors";
export {
  DEFAULT_BIND_POLICY,
  STRICT_BIND_POLICY,
  resolvePolicy,
  type BindPolicy,
} from "./bind/policy";
export { normalizeKey } from "./bind/names";
export { coerceScalar, zeroValue, type FieldValue } from "./bind/coerce";
export { inspectSignature, type BindingPlan } from "./bind/inspect";
export { resolveFlatFields } from "./bind/resolve";
export { decodeBody } from "./bind/decode";
export {
  bodyFrom,
  emptyBody,
  paramLookupFrom,
  queryFromSearchParams,
  queryFromUrl,
  type BindingRequest,
  type BodySource,
  type QueryMultimap,
  type UrlParamLookup,
} from "./bind/request";

// Express adapter
export {
  bindRoute,
  toBindingRequest,
  urlParamLookup,
  type Responder,
} from "./http/express/expressBinding";
export { asyncHandler } from "./middleware/asyncHandler";
export { requestIdMiddleware, getRequestId } from "./middleware/requestId";
export { makeHttpLogger } from "./middleware/httpLogger";
export { createServiceApp } from "./app/createServiceApp";

// Problems
export { ProblemFactory, type ProblemJson } from "./problem/problem";
export { createProblemMiddleware } from "./problem/createProblemMiddleware";

// Logging + env
export {
  LOG_LEVELS,
  getLogger,
  setLogLevel,
  setRootLogger,
  type IBoundLogger,
  type ILogger,
  type LogLevel,
} from "./logger/Logger";
export * from "./env";
