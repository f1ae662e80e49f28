/**
 * XML serialization for Cloud Storage XML API request bodies, plus parsing
 * helpers for the documents the service returns.
 */

import { XMLBuilder, XMLParser } from "fast-xml-parser";
import type { CorsDefaults, CorsRule, LocationConstraint } from "../types/index.js";

/**
 * Declaration line prepended to every request body.
 */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: false,
  suppressEmptyNode: false,
  processEntities: true,
};

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Element tree accepted by the builder: element name to text, child tree,
 * or a list of repeated siblings.
 */
export interface XmlTree {
  [element: string]: string | XmlTree | Array<string | XmlTree>;
}

/**
 * Serialize an element tree as a complete UTF-8 document with no whitespace
 * between the declaration and the root element.
 */
export function buildXmlDocument(tree: XmlTree): string {
  const builder = new XMLBuilder(BUILDER_OPTIONS);
  return XML_DECLARATION + builder.build(tree);
}

/**
 * Parse an XML document into a plain object.
 *
 * @throws Error if the document is not well formed
 */
export function parseXml<T>(xml: string): T {
  const parser = new XMLParser(PARSER_OPTIONS);
  try {
    const parsed: T = parser.parse(xml, true);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse XML: ${detail}`);
  }
}

/**
 * Repeated elements parse as an array, a single one as a scalar; this
 * always yields an array.
 */
export function normalizeArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Body for bucket creation with a location constraint.
 */
export function buildLocationConstraintXml(location: LocationConstraint): string {
  return buildXmlDocument({
    CreateBucketConfiguration: {
      LocationConstraint: location,
    },
  });
}

/**
 * Format `MaxAgeSec`: whole numbers as plain integers at any magnitude,
 * fractional numbers with six decimals, strings verbatim. `NaN` and the
 * infinities are written as `String()` gives them and left to the service
 * to reject.
 */
export function formatMaxAge(maxAgeSec: number | string): string {
  if (typeof maxAgeSec === "string") {
    return maxAgeSec;
  }
  if (!Number.isFinite(maxAgeSec)) {
    return String(maxAgeSec);
  }
  return Number.isInteger(maxAgeSec) ? BigInt(maxAgeSec).toString() : maxAgeSec.toFixed(6);
}

/**
 * Apply CORS defaults: an absent or empty list becomes the single default,
 * and blank entries of a non-empty list are replaced one by one.
 */
export function resolveCorsRule(
  rule: CorsRule | undefined,
  defaults: CorsDefaults
): Required<CorsRule> {
  const fill = (values: string[] | undefined, fallback: string): string[] => {
    if (!values || values.length === 0) {
      return [fallback];
    }
    return values.map((value) => value.trim() || fallback);
  };

  const maxAgeSec = rule?.maxAgeSec;

  return {
    origins: fill(rule?.origins, defaults.origin),
    methods: fill(rule?.methods, defaults.method),
    responseHeaders: fill(rule?.responseHeaders, defaults.responseHeader),
    maxAgeSec: maxAgeSec === undefined || maxAgeSec === "" || maxAgeSec === 0 ? defaults.maxAgeSec : maxAgeSec,
  };
}

/**
 * Body for setting bucket CORS.
 *
 * @example
 * ```typescript
 * buildCorsXml({ origins: ["https://example.com"] }, DEFAULT_CORS);
 * // <?xml version="1.0" encoding="UTF-8"?><CorsConfig><Cors><Origins>
 * // <Origin>https://example.com</Origin></Origins><Methods><Method>GET</Method>
 * // </Methods>...<MaxAgeSec>1800</MaxAgeSec></Cors></CorsConfig>
 * ```
 */
export function buildCorsXml(rule: CorsRule | undefined, defaults: CorsDefaults): string {
  const resolved = resolveCorsRule(rule, defaults);

  return buildXmlDocument({
    CorsConfig: {
      Cors: {
        Origins: { Origin: resolved.origins },
        Methods: { Method: resolved.methods },
        ResponseHeaders: { ResponseHeader: resolved.responseHeaders },
        MaxAgeSec: formatMaxAge(resolved.maxAgeSec),
      },
    },
  });
}

interface CorsDocument {
  CorsConfig?: {
    Cors?: CorsElement | CorsElement[];
  };
}

interface CorsElement {
  Origins?: { Origin?: string | string[] };
  Methods?: { Method?: string | string[] };
  ResponseHeaders?: { ResponseHeader?: string | string[] };
  MaxAgeSec?: string;
}

/**
 * Parse a `CorsConfig` document into its rules, in document order.
 */
export function parseCorsXml(xml: string): Array<Required<CorsRule>> {
  const document = parseXml<CorsDocument>(xml);

  return normalizeArray(document.CorsConfig?.Cors).map((cors) => ({
    origins: normalizeArray(cors.Origins?.Origin),
    methods: normalizeArray(cors.Methods?.Method),
    responseHeaders: normalizeArray(cors.ResponseHeaders?.ResponseHeader),
    maxAgeSec: cors.MaxAgeSec ?? "",
  }));
}

interface LocationDocument {
  LocationConstraint?: string | { "#text"?: string };
}

/**
 * Extract the location from a `?location` response body.
 */
export function parseLocationXml(xml: string): string | undefined {
  const location = parseXml<LocationDocument>(xml).LocationConstraint;
  if (typeof location === "string") {
    return location || undefined;
  }
  return location?.["#text"];
}
