import {
  blankNode,
  iri,
  langString,
  plainString,
  typedLiteral,
  XSD_BOOLEAN,
  XSD_FLOAT,
  XSD_INTEGER,
  type Value,
} from "@linkedql/quad";
import { isLosslessNumber } from "lossless-json";
import { DEFAULT_FLOAT_FORMAT, type FloatFormat, type ValueParserOptions } from "./config";
import { UnparsableValueError } from "./errors";
import { isJsonRecord, readString, type JsonRecord } from "./utils/json";

const BLANK_NODE_PREFIX = "_:";

/** JSON number text without a fraction or exponent */
const INTEGER_TEXT = /^-?\d+$/;

const FIXED_FRACTION_DIGITS = 6;

// The doubles exactly halfway between two 6-digit results are the odd multiples of 2^-7
const HALFWAY_SCALE = 2 ** (FIXED_FRACTION_DIGITS + 1);

/**
 * Parse one JSON-LD wire value (already JSON-decoded) into an RDF term.
 *
 * Strings are plain literals; numbers and booleans become XSD typed
 * literals; objects must carry `@id` (IRI or `_:` blank node) or a string
 * `@value` qualified by `@language` or `@type`. A `LosslessNumber` is typed
 * by its wire text, so `1.0` stays a float and long integers keep every digit.
 */
export function parseValue(raw: unknown, options: ValueParserOptions = {}): Value {
  switch (typeof raw) {
    case "string":
      return plainString(raw);
    case "number":
      return parseNumber(raw, options.floatFormat ?? DEFAULT_FLOAT_FORMAT);
    case "boolean":
      return typedLiteral(raw ? "true" : "false", XSD_BOOLEAN);
    case "object":
      if (isLosslessNumber(raw)) {
        return parseNumberText(raw.value, options.floatFormat ?? DEFAULT_FLOAT_FORMAT);
      }
      if (isJsonRecord(raw)) {
        const value = parseNodeObject(raw);
        if (value) {
          return value;
        }
      }
      break;
    default:
      break;
  }
  throw new UnparsableValueError("cannot parse value", { value: raw });
}

function parseNumber(raw: number, floatFormat: FloatFormat): Value {
  if (Number.isInteger(raw)) {
    // BigInt keeps large integers in plain decimal, never exponent notation
    return typedLiteral(BigInt(raw).toString(), XSD_INTEGER);
  }
  if (!Number.isFinite(raw)) {
    throw new UnparsableValueError("cannot parse value", { value: raw });
  }
  return typedLiteral(formatFloat(raw, floatFormat), XSD_FLOAT);
}

function parseNumberText(text: string, floatFormat: FloatFormat): Value {
  if (INTEGER_TEXT.test(text)) {
    return typedLiteral(BigInt(text).toString(), XSD_INTEGER);
  }
  const raw = Number(text);
  if (!Number.isFinite(raw)) {
    throw new UnparsableValueError("cannot parse value", { value: text });
  }
  return typedLiteral(formatFloat(raw, floatFormat), XSD_FLOAT);
}

export function formatFloat(raw: number, floatFormat: FloatFormat): string {
  switch (floatFormat) {
    case "fixed":
      return toFixedHalfEven(raw);
    case "shortest":
      return String(raw);
    default:
      floatFormat satisfies never;
      throw new UnparsableValueError(`Unknown float format '${String(floatFormat)}'`);
  }
}

/** `toFixed(6)`, except that exact ties go to the even digit instead of away from zero. */
function toFixedHalfEven(raw: number): string {
  const rounded = raw.toFixed(FIXED_FRACTION_DIGITS);
  if (Math.abs(raw * HALFWAY_SCALE) % 2 !== 1) {
    return rounded;
  }
  // a tie has exactly one more digit, a 5, so this text is exact
  const truncated = raw.toFixed(FIXED_FRACTION_DIGITS + 1).slice(0, -1);
  return Number(truncated.slice(-1)) % 2 === 0 ? truncated : rounded;
}

function parseNodeObject(node: JsonRecord): Value | undefined {
  const id = readString(node, "@id");
  if (id !== undefined) {
    return id.startsWith(BLANK_NODE_PREFIX) ? blankNode(id.slice(BLANK_NODE_PREFIX.length)) : iri(id);
  }

  const text = readString(node, "@value");
  if (text === undefined) {
    return undefined;
  }
  const language = readString(node, "@language");
  if (language !== undefined) {
    return langString(text, language);
  }
  const datatype = readString(node, "@type");
  if (datatype !== undefined) {
    return typedLiteral(text, datatype);
  }
  return undefined;
}
