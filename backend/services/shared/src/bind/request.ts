// backend/services/shared/src/bind/request.ts
/**
 * Purpose:
 * - Transport-agnostic view of an inbound request, as the binding engine sees it.
 *
 * Invariants:
 * - No Express/HTTP framework imports (adapters live under http/).
 * - Query keys keep their raw spelling and order; duplicates are preserved.
 * - The body is a single-read byte stream.
 */

/** key → ordered values, duplicates preserved. */
export type QueryMultimap = ReadonlyMap<string, readonly string[]>;

/** Any Node Readable (an http.IncomingMessage included) satisfies this. */
export type BodySource = AsyncIterable<Uint8Array | string>;

export interface BindingRequest {
  readonly query: QueryMultimap;
  readonly body: BodySource;
}

/** Path-parameter lookup. "" means not found. */
export type UrlParamLookup = (name: string) => string;

export function queryFromSearchParams(params: URLSearchParams): QueryMultimap {
  const out = new Map<string, string[]>();
  for (const [key, value] of params) {
    const values = out.get(key);
    if (values) values.push(value);
    else out.set(key, [value]);
  }
  return out;
}

/** Accepts an absolute URL or a path with a query string ("/user/1?x=2"). */
export function queryFromUrl(url: string): QueryMultimap {
  return queryFromSearchParams(new URL(url, "http://localhost").searchParams);
}

/** Lookup over a fixed set of pairs, case-insensitive, last declared wins. */
export function paramLookupFrom(
  pairs: ReadonlyArray<readonly [string, string]>
): UrlParamLookup {
  return (name) => {
    const wanted = name.toLowerCase();
    for (let i = pairs.length - 1; i >= 0; i--) {
      const [key, value] = pairs[i];
      if (key.toLowerCase() === wanted) return value;
    }
    return "";
  };
}

export function emptyBody(): BodySource {
  return {
    async *[Symbol.asyncIterator]() {
      // nothing to yield
    },
  };
}

export function bodyFrom(text: string): BodySource {
  return {
    async *[Symbol.asyncIterator]() {
      yield text;
    },
  };
}
