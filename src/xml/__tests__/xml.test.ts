/**
 * Tests for XML bodies and response parsing
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_CORS } from "../../config/index.js";
import {
  buildCorsXml,
  buildLocationConstraintXml,
  formatMaxAge,
  normalizeArray,
  parseCorsXml,
  parseLocationXml,
  parseXml,
  resolveCorsRule,
} from "../index.js";

describe("formatMaxAge", () => {
  it("writes whole numbers without decimals", () => {
    expect(formatMaxAge(1800)).toBe("1800");
  });

  it("writes whole numbers past 1e21 in full", () => {
    expect(formatMaxAge(1e21)).toBe("1000000000000000000000");
    expect(formatMaxAge(-1e21)).toBe("-1000000000000000000000");
  });

  it("passes non-finite numbers through as text", () => {
    expect(formatMaxAge(Number.NaN)).toBe("NaN");
    expect(formatMaxAge(Number.POSITIVE_INFINITY)).toBe("Infinity");
    expect(formatMaxAge(Number.NEGATIVE_INFINITY)).toBe("-Infinity");
  });

  it("writes fractional numbers with six decimals", () => {
    expect(formatMaxAge(2.5)).toBe("2.500000");
  });

  it("passes strings through unchanged", () => {
    expect(formatMaxAge("90")).toBe("90");
    expect(formatMaxAge("1e3")).toBe("1e3");
  });
});

describe("resolveCorsRule", () => {
  it("uses every default for an absent rule", () => {
    expect(resolveCorsRule(undefined, DEFAULT_CORS)).toEqual({
      origins: ["*"],
      methods: ["GET"],
      responseHeaders: ["gcs-demo"],
      maxAgeSec: 1800,
    });
  });

  it("trims entries and replaces blank ones", () => {
    const resolved = resolveCorsRule(
      { origins: [" http://a.example ", ""], methods: ["PUT", "  "], responseHeaders: [""] },
      DEFAULT_CORS
    );
    expect(resolved.origins).toEqual(["http://a.example", "*"]);
    expect(resolved.methods).toEqual(["PUT", "GET"]);
    expect(resolved.responseHeaders).toEqual(["gcs-demo"]);
  });

  it("treats zero and empty max age as unset", () => {
    expect(resolveCorsRule({ maxAgeSec: 0 }, DEFAULT_CORS).maxAgeSec).toBe(1800);
    expect(resolveCorsRule({ maxAgeSec: "" }, DEFAULT_CORS).maxAgeSec).toBe(1800);
    expect(resolveCorsRule({ maxAgeSec: "60" }, DEFAULT_CORS).maxAgeSec).toBe("60");
  });
});

describe("buildLocationConstraintXml", () => {
  it("starts with the declaration and no whitespace", () => {
    expect(buildLocationConstraintXml("US")).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>' +
        "<CreateBucketConfiguration><LocationConstraint>US</LocationConstraint></CreateBucketConfiguration>"
    );
  });
});

describe("parseCorsXml", () => {
  it("reads back a generated document", () => {
    const xml = buildCorsXml(
      { origins: ["http://a.example", "http://b.example"], methods: ["GET", "PUT"], maxAgeSec: 2.5 },
      DEFAULT_CORS
    );

    expect(parseCorsXml(xml)).toEqual([
      {
        origins: ["http://a.example", "http://b.example"],
        methods: ["GET", "PUT"],
        responseHeaders: ["gcs-demo"],
        maxAgeSec: "2.500000",
      },
    ]);
  });

  it("returns every rule of a multi-rule document", () => {
    const xml =
      "<CorsConfig>" +
      "<Cors><Origins><Origin>http://a.example</Origin></Origins><MaxAgeSec>10</MaxAgeSec></Cors>" +
      "<Cors><Methods><Method>DELETE</Method></Methods></Cors>" +
      "</CorsConfig>";

    expect(parseCorsXml(xml)).toEqual([
      { origins: ["http://a.example"], methods: [], responseHeaders: [], maxAgeSec: "10" },
      { origins: [], methods: ["DELETE"], responseHeaders: [], maxAgeSec: "" },
    ]);
  });

  it("returns no rules for an empty configuration", () => {
    expect(parseCorsXml("<CorsConfig></CorsConfig>")).toEqual([]);
  });
});

describe("parseLocationXml", () => {
  it("extracts the location", () => {
    expect(
      parseLocationXml('<?xml version="1.0" encoding="UTF-8"?><LocationConstraint>EU</LocationConstraint>')
    ).toBe("EU");
  });

  it("returns undefined for an empty element", () => {
    expect(parseLocationXml("<LocationConstraint/>")).toBeUndefined();
  });
});

describe("parseXml", () => {
  it("rejects malformed documents", () => {
    expect(() => parseXml("<a><b></a>")).toThrow(/^Failed to parse XML: /);
  });
});

describe("normalizeArray", () => {
  it("wraps scalars and drops undefined", () => {
    expect(normalizeArray("x")).toEqual(["x"]);
    expect(normalizeArray(["x", "y"])).toEqual(["x", "y"]);
    expect(normalizeArray<string>(undefined)).toEqual([]);
  });
});
