import { describe, expect, it } from "vitest";
import { encodeQuery, percentEncode } from "@/encoding/query";
import { scalar, toParamValue } from "@/params/value";

describe("query.ts", () => {
  describe("encodeQuery", () => {
    it("should encode nested mappings and sequences with brackets", () => {
      const tree = toParamValue({ a: { b: "1", c: ["2", "3"] } });
      expect(encodeQuery(tree)).toBe("a[b]=1&a[c][0]=2&a[c][1]=3&");
    });

    it("should keep insertion order instead of sorting", () => {
      expect(encodeQuery(toParamValue({ b: "1", a: "2" }))).toBe("b=1&a=2&");
    });

    it("should leave out empty values at every depth", () => {
      const tree = toParamValue({ a: { b: "", c: "1" }, d: 0, e: [], f: null });
      expect(encodeQuery(tree)).toBe("a[c]=1&");
    });

    it("should keep item indexes around skipped ones", () => {
      expect(encodeQuery(toParamValue({ k: ["a", "", "b"] }))).toBe("k[0]=a&k[2]=b&");
    });

    it("should encode sequences of mappings", () => {
      const tree = toParamValue({
        items: [
          { name: "A", qty: 2 },
          { name: "B", qty: 1 },
        ],
      });

      expect(encodeQuery(tree)).toBe(
        "items[0][name]=A&items[0][qty]=2&items[1][name]=B&items[1][qty]=1&"
      );
    });

    it("should escape key segments but not the brackets between them", () => {
      const tree = toParamValue({ "first name": { "x&y": "a b" } });
      expect(encodeQuery(tree)).toBe("first%20name[x%26y]=a%20b&");
    });

    it("should key a top-level sequence by index", () => {
      expect(encodeQuery(toParamValue(["x", "y"]))).toBe("0=x&1=y&");
    });

    it("should render true in its literal form", () => {
      expect(encodeQuery(toParamValue({ is_manual_delivery_cost: true }))).toBe(
        "is_manual_delivery_cost=True&"
      );
    });

    it("should encode caller fields named kind and items as data", () => {
      const tree = toParamValue({ parcel: { kind: "sequence", items: ["a", "b"] } });
      expect(encodeQuery(tree)).toBe(
        "parcel[kind]=sequence&parcel[items][0]=a&parcel[items][1]=b&"
      );
    });

    it("should emit nothing for a bare scalar", () => {
      expect(encodeQuery(scalar("lonely"))).toBe("");
    });
  });

  describe("percentEncode", () => {
    it("should use %20 for spaces", () => {
      expect(percentEncode("a b")).toBe("a%20b");
    });

    it("should leave unreserved characters and slashes alone", () => {
      expect(percentEncode("AZaz09-_.~")).toBe("AZaz09-_.~");
      expect(percentEncode("x/y")).toBe("x/y");
    });

    it("should escape sub-delimiters", () => {
      expect(percentEncode("!'()*")).toBe("%21%27%28%29%2A");
      expect(percentEncode("a+b&c=d")).toBe("a%2Bb%26c%3Dd");
    });

    it("should escape non-ASCII as UTF-8 bytes", () => {
      expect(percentEncode("Москва")).toBe("%D0%9C%D0%BE%D1%81%D0%BA%D0%B2%D0%B0");
    });
  });
});
