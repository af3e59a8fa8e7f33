// backend/services/demo/src/handlers/userPost.ts
import { defineHandler, field, type BindPolicy } from "@bindparams/shared";

/** GET /user/:id/post/:postId: both values come from the path. */
export function userPostHandler(policy: Partial<BindPolicy> = {}) {
  return defineHandler(
    { params: { id: field.int(), postId: field.int() } },
    function userPost(params) {
      return [params] as const;
    },
    policy
  );
}
