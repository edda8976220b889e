import { isEmpty, scalarText, type ParamValue } from "../params/value";

/**
 * Percent-encodes one key segment or value.
 *
 * Leaves `A-Z a-z 0-9 - _ . ~` and `/` as they are and escapes everything
 * else as UTF-8 `%XX`; space becomes `%20`, not `+`.
 */
export function percentEncode(input: string): string {
  return encodeURIComponent(input)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, "/");
}

function childPrefix(prefix: string | undefined, key: string): string {
  const segment = percentEncode(key);
  return prefix === undefined ? segment : `${prefix}[${segment}]`;
}

/**
 * Serializes a parameter tree into a nested-bracket form body.
 *
 * Mappings keep insertion order; sequences are keyed by their 0-based
 * index. Every pair is followed by `&`, the last one included.
 *
 * @example
 * ```typescript
 * encodeQuery(toParamValue({ a: { b: "1", c: ["2", "3"] } }))
 * // "a[b]=1&a[c][0]=2&a[c][1]=3&"
 * ```
 */
export function encodeQuery(value: ParamValue, prefix?: string): string {
  switch (value.kind) {
    case "scalar":
      // a bare scalar has no key to attach to
      if (prefix === undefined) return "";
      return `${prefix}=${percentEncode(scalarText(value))}&`;
    case "sequence":
      return encodePairs(
        value.items.map((item, i): [string, ParamValue] => [String(i), item]),
        prefix
      );
    case "mapping":
      return encodePairs(value.entries, prefix);
  }
}

function encodePairs(
  pairs: Iterable<readonly [string, ParamValue]>,
  prefix: string | undefined
): string {
  let out = "";
  for (const [key, child] of pairs) {
    if (isEmpty(child)) continue;
    out += encodeQuery(child, childPrefix(prefix, key));
  }
  return out;
}
