// backend/services/shared/src/env.ts

/**
 * Purpose:
 * - Deterministic env-file loading plus small typed getters for boot config.
 *
 * Layering:
 * - loadEnvFiles() loads files in order; a variable already present in the
 *   process environment is never overwritten, and `${VAR}` references are
 *   expanded (dotenv-expand).
 *
 * Notes:
 * - Getters take an optional env source so callers (and tests) can pass a
 *   plain object instead of mutating process.env.
 * - Only loading + validators live here. Boot policy belongs to each service.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error)
    throw new Error(
      `Failed to load env file: ${absPath} (${String(parsed.error)})`
    );
  expand(parsed);
  return true;
}

/**
 * Load several files in order. Returns the absolute paths that were loaded.
 * Throws if none loaded and allowMissing is false.
 */
export function loadEnvFiles(
  files: readonly string[],
  opts: { allowMissing?: boolean; baseDir?: string } = {}
): string[] {
  const loaded: string[] = [];
  for (const f of files) {
    const abs = path.resolve(opts.baseDir ?? process.cwd(), f);
    if (loadIfExists(abs)) loaded.push(abs);
  }
  if (loaded.length === 0 && !opts.allowMissing)
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  return loaded;
}

function read(name: string, env: EnvSource): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

export function optionalString(
  name: string,
  fallback: string,
  env: EnvSource = process.env
): string {
  return read(name, env) ?? fallback;
}

export function optionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  fallback: T,
  env: EnvSource = process.env
): T {
  const v = read(name, env);
  if (v === undefined) return fallback;
  const hit = allowed.find((a) => a === v);
  if (hit === undefined)
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  return hit;
}

export function optionalNumber(
  name: string,
  fallback: number,
  env: EnvSource = process.env
): number {
  const v = read(name, env);
  if (v === undefined) return fallback;
  if (!/^-?\d+(\.\d+)?$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}
