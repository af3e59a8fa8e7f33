// backend/services/shared/src/bind/into.ts
/**
 * Purpose:
 * - Public binding API.
 *   • defineHandler(): declare { params, body? } + fn; inspected immediately
 *   • bindInto():      resolve → decode → invoke for one request
 *   • into():          one-shot define + bind
 *
 * Usage:
 *   const getPost = defineHandler(
 *     { params: { id: field.int(), postId: field.int() } },
 *     (params) => [params] as const
 *   );
 *   const [bound] = await bindInto(request, lookup, getPost);
 *
 * Invariants:
 * - A misdeclared handler throws ConfigurationError from defineHandler(), so
 *   it fails at registration, never per request.
 * - Each invocation builds its own arguments; nothing is shared across calls.
 * - Return values are forwarded unchanged, in declaration order.
 */

import type { ZodTypeAny, output } from "zod";
import { getLogger } from "../logger/Logger";
import type { FieldsShape, InferFields } from "./dsl/types";
import { decodeBody } from "./decode";
import { inspectSignature, type BindingPlan } from "./inspect";
import { resolvePolicy, type BindPolicy } from "./policy";
import type { BindingRequest, UrlParamLookup } from "./request";
import { resolveFlatFields } from "./resolve";

/** A handler's declared outputs; [] when it declares none. */
export type Outputs = readonly unknown[];

export type BindingSignature = {
  params: FieldsShape;
  body?: ZodTypeAny;
};

export type HandlerArgs<Sig extends BindingSignature> = Sig extends {
  body: infer B extends ZodTypeAny;
}
  ? [params: InferFields<Sig["params"]>, body: output<B>]
  : [params: InferFields<Sig["params"]>];

export type HandlerFn<Sig extends BindingSignature, R extends Outputs> = (
  ...args: HandlerArgs<Sig>
) => R | Promise<R>;

export interface BindableHandler<R extends Outputs> {
  readonly name: string;
  readonly plan: BindingPlan;
  readonly policy: Readonly<BindPolicy>;
  /** Invoker: call the handler with an assembled argument list. */
  invoke(args: unknown[]): Promise<R>;
}

export function defineHandler<
  Sig extends BindingSignature,
  R extends Outputs
>(
  signature: Sig,
  fn: HandlerFn<Sig, R>,
  policy: Partial<BindPolicy> = {}
): BindableHandler<R> {
  const plan = inspectSignature(signature, fn);
  const name = fn.name || "anonymous";

  getLogger({ component: "bind", handler: name }).debug(
    {
      event: "plan_built",
      arity: plan.arity,
      fields: plan.fields.map((f) => f.key),
    },
    "handler signature inspected"
  );

  return {
    name,
    plan,
    policy: Object.freeze(resolvePolicy(policy)),
    async invoke(args) {
      // args were assembled from `plan`, which inspectSignature derived from Sig
      return fn(...(args as HandlerArgs<Sig>));
    },
  };
}

export async function bindInto<R extends Outputs>(
  request: BindingRequest,
  getUrlParam: UrlParamLookup,
  handler: BindableHandler<R>
): Promise<R> {
  const log = getLogger({ component: "bind", handler: handler.name });
  const { plan, policy } = handler;

  const params = resolveFlatFields(
    plan.fields,
    request.query,
    getUrlParam,
    policy,
    log
  );

  const args: unknown[] = [params];
  if (plan.body) {
    args.push(await decodeBody(request.body, plan.body));
    log.debug({ event: "body_decoded" }, "request body decoded");
  }

  return handler.invoke(args);
}

export async function into<Sig extends BindingSignature, R extends Outputs>(
  request: BindingRequest,
  getUrlParam: UrlParamLookup,
  signature: Sig,
  fn: HandlerFn<Sig, R>,
  policy: Partial<BindPolicy> = {}
): Promise<R> {
  return bindInto(request, getUrlParam, defineHandler<Sig, R>(signature, fn, policy));
}
