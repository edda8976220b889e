/* ------------------------------------------------------------------
 * signer.ts  •  Per-method request signature
 * ------------------------------------------------------------------
 *  signature = md5_hex( canonicalize(data) + method_key )
 *
 *  The digest is fixed by the remote API, which recomputes it from the
 *  received form fields; any other algorithm is rejected there.
 * ------------------------------------------------------------------ */

import { createHash } from "node:crypto";

import { canonicalize } from "./canonical";
import type { ParamValue } from "../params/value";

export function signingInput(data: ParamValue, secret: string): string {
  return canonicalize(data) + secret;
}

/** Lowercase hex MD5 over the UTF-8 signing input */
export function sign(data: ParamValue, secret: string): string {
  return createHash("md5").update(signingInput(data, secret), "utf8").digest("hex");
}
