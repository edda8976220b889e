import { isEmpty, scalarText, type ParamValue } from "../params/value";

/**
 * Linearizes a parameter tree into the string the signature is computed over.
 *
 * Mapping keys are visited in ascending order, sequence items in their given
 * order, and empty values are skipped. Fragments are joined with no
 * delimiter, so two trees holding the same data always give the same string.
 *
 * @example
 * ```typescript
 * canonicalize(toParamValue({ y: { z: "6" }, x: "5" })) // "56"
 * ```
 */
export function canonicalize(value: ParamValue): string {
  switch (value.kind) {
    case "scalar":
      return scalarText(value);
    case "sequence":
      return value.items
        .filter((item) => !isEmpty(item))
        .map(canonicalize)
        .join("");
    case "mapping": {
      const keys = [...value.entries.keys()].sort();
      let out = "";
      for (const key of keys) {
        const child = value.entries.get(key);
        if (child === undefined || isEmpty(child)) continue;
        out += canonicalize(child);
      }
      return out;
    }
  }
}
