import { XMLParser, XMLValidator } from "fast-xml-parser";

export type SidecarMetadata = {
  capturedAt: number;
  offsetMinutes: number;
  wallClock: number;
  derivedFrom: boolean;
};

export type ParsedDate = {
  wallClock: number;
  offsetMinutes: number | null;
};

const DATE_PROPERTIES = ["exif:DateTimeOriginal", "photoshop:DateCreated", "xmp:CreateDate"];
const OFFSET_PROPERTY = "exif:OffsetTimeOriginal";
const DERIVED_FROM_PROPERTY = "xmpMM:DerivedFrom";

const DATE_PATTERN =
  /^(\d{4})[-:](\d{2})[-:](\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

export function parseOffset(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === "Z") {
    return 0;
  }
  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(trimmed);
  if (!match) {
    return null;
  }
  const sign = match[1] === "-" ? -1 : 1;
  return sign * (Number(match[2]) * 60 + Number(match[3]));
}

/**
 * Parses XMP and EXIF style dates. `wallClock` is the written local time read as if it were UTC;
 * the offset is null when the value carries none.
 */
export function parseXmpDate(value: string): ParsedDate | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const millis = fraction ? Number(`${fraction}00`.slice(0, 3)) : 0;
  const wallClock = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour ?? "0"),
    Number(minute ?? "0"),
    Number(second ?? "0"),
    millis
  );
  if (!Number.isFinite(wallClock)) {
    return null;
  }

  return { wallClock, offsetMinutes: offset ? parseOffset(offset) : null };
}

export function parseSidecar(xml: string): SidecarMetadata {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(`invalid XMP: ${validation.err.msg} (line ${validation.err.line})`);
  }

  const properties = new Map<string, string>();
  collectProperties(parser.parse(xml), properties);

  let parsed: ParsedDate | null = null;
  for (const name of DATE_PROPERTIES) {
    const raw = properties.get(name);
    if (raw) {
      parsed = parseXmpDate(raw);
      if (parsed) {
        break;
      }
    }
  }

  if (!parsed) {
    throw new Error("no capture date in XMP");
  }

  let offsetMinutes = parsed.offsetMinutes;
  if (offsetMinutes === null) {
    const rawOffset = properties.get(OFFSET_PROPERTY);
    offsetMinutes = rawOffset ? parseOffset(rawOffset) : null;
  }

  if (offsetMinutes === null) {
    throw new Error("capture date has no timezone offset");
  }

  return {
    wallClock: parsed.wallClock,
    offsetMinutes,
    capturedAt: parsed.wallClock - offsetMinutes * 60_000,
    derivedFrom: properties.has(DERIVED_FROM_PROPERTY),
  };
}

// Flattens every element and attribute into name -> text; the first occurrence wins.
function collectProperties(node: unknown, out: Map<string, string>): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      collectProperties(item, out);
    }
    return;
  }

  if (!node || typeof node !== "object") {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    const name = key.startsWith("@_") ? key.slice(2) : key;
    if (typeof value === "string" || typeof value === "number") {
      if (!out.has(name)) {
        out.set(name, String(value));
      }
      continue;
    }

    if (Array.isArray(value)) {
      const first: unknown = value[0];
      if (!out.has(name) && (typeof first === "string" || typeof first === "number")) {
        out.set(name, String(first));
      }
    } else if (value && typeof value === "object") {
      const text: unknown = Reflect.get(value, "#text");
      if (!out.has(name)) {
        out.set(name, typeof text === "string" || typeof text === "number" ? String(text) : "");
      }
    }
    collectProperties(value, out);
  }
}
