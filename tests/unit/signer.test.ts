import { describe, expect, it } from "vitest";
import { sign, signingInput } from "@/crypto/signer";
import { mapping, toParamValue } from "@/params/value";

describe("signer.ts", () => {
  it("should append the method key to the canonical string", () => {
    const data = toParamValue({ x: "5", y: { z: "6" } });

    expect(signingInput(data, "abc")).toBe("56abc");
    expect(sign(data, "abc")).toBe("aba3fa0cc39bab2779fab33417e9ab5c");
  });

  it("should produce a lowercase 32-char hex digest", () => {
    expect(sign(mapping([]), "")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(sign(toParamValue({ a: "A" }), "KEY")).toMatch(/^[0-9a-f]{32}$/);
  });

  it("should hash the UTF-8 bytes of the signing input", () => {
    expect(sign(toParamValue({ city: "Москва" }), "k")).toBe(
      "2214e1b8ec3a609ca6739b490bace403"
    );
  });

  it("should change when a retained value changes", () => {
    const before = sign(toParamValue({ weight: 2, city: "Kazan" }), "s");
    const after = sign(toParamValue({ weight: 3, city: "Kazan" }), "s");

    expect(after).not.toBe(before);
  });

  it("should not change when only an empty value changes", () => {
    const withNull = sign(toParamValue({ city: "Kazan", comment: null }), "s");
    const withBlank = sign(toParamValue({ city: "Kazan", comment: "" }), "s");
    const withZero = sign(toParamValue({ city: "Kazan", comment: 0 }), "s");

    expect(withBlank).toBe(withNull);
    expect(withZero).toBe(withNull);
  });
});
