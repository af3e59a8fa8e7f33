// backend/services/demo/src/routes/demo.routes.ts
import type { Response, Router } from "express";
import { bindRoute, type BindPolicy } from "@bindparams/shared";
import { createUserHandler } from "../handlers/createUser";
import { queryArraysHandler, querySimpleHandler } from "../handlers/queryStrings";
import { userPostHandler } from "../handlers/userPost";

function sendFirst(res: Response, outputs: readonly [unknown]): void {
  res.json(outputs[0]);
}

// one-liners only, no logic here
export function mountDemoRoutes(router: Router, policy: Partial<BindPolicy>): void {
  router.get("/user/:id/post/:postId", bindRoute(userPostHandler(policy), sendFirst));
  router.get("/query-strings-simple/:id", bindRoute(querySimpleHandler(policy), sendFirst));
  router.get("/query-strings-arrays/:id", bindRoute(queryArraysHandler(policy), sendFirst));
  router.post("/user/:id", bindRoute(createUserHandler(policy), sendFirst));
}
