// backend/services/demo/src/handlers/createUser.ts
/**
 * POST /user/:id with a JSON body.
 * - `age` may arrive as an integer or a string of digits ("27"); nothing else
 *   converts to a number.
 * - Missing keys bind as zero values ("" and 0).
 */

import { z } from "zod";
import { defineHandler, field, type BindPolicy } from "@bindparams/shared";

export const userBody = z.object({
  name: z.string().default(""),
  age: z
    .union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)])
    .default(0),
});

export type UserBody = z.infer<typeof userBody>;

export function createUserHandler(policy: Partial<BindPolicy> = {}) {
  return defineHandler(
    { params: { id: field.int() }, body: userBody },
    function createUser(params, user: UserBody) {
      return [{ id: params.id, user }] as const;
    },
    policy
  );
}
