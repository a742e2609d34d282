import type { Value } from "@linkedql/quad";
import { parse as parseJson } from "lossless-json";
import { resolveDecoderOptions, type DecoderOptions, type ResolvedDecoderOptions } from "./config";
import {
  InvalidFieldShapeError,
  MalformedInputError,
  MissingDiscriminatorError,
  UnparsableValueError,
  UnsupportedTypeError,
} from "./errors";
import { DISCRIMINATOR_KEY, wireKeyOf, type AnyShapeDescriptor, type FieldSpec, type RegistryItem } from "./shape";
import type { TypeRegistry } from "./typeRegistry";
import { isJsonRecord, toPlainJson, type JsonRecord } from "./utils/json";
import { parseValue } from "./valueParser";

export type DecoderInput = string | Uint8Array;

interface DecodeState {
  registry: TypeRegistry;
  options: ResolvedDecoderOptions;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Rebuilds registered items from their JSON-LD wire form.
 *
 * The registry is injected and sealed on first use; decoding itself keeps
 * no state between calls.
 */
export class ItemDecoder {
  private readonly state: DecodeState;

  constructor(registry: TypeRegistry, options: DecoderOptions = {}) {
    this.state = { registry, options: resolveDecoderOptions(options) };
  }

  /** Decode a complete wire document (JSON text or UTF-8 bytes). */
  decode(input: DecoderInput): RegistryItem {
    return this.decodeParsed(parseDocument(input));
  }

  /**
   * Decode an already-parsed JSON value. Numbers may be plain or
   * `LosslessNumber`s; only the latter keep their wire text.
   */
  decodeParsed(raw: unknown): RegistryItem {
    const { registry, options } = this.state;
    if (!registry.sealed) {
      registry.seal();
    }
    const item = decodeObject(raw, this.state, "$");
    options.logger.debug("Decoded item", { typeName: item[DISCRIMINATOR_KEY] });
    return item;
  }
}

/** One-shot decode against a registry. */
export function decodeItem(registry: TypeRegistry, input: DecoderInput, options?: DecoderOptions): RegistryItem {
  return new ItemDecoder(registry, options).decode(input);
}

function parseDocument(input: DecoderInput): unknown {
  let text: string;
  try {
    text = typeof input === "string" ? input : utf8.decode(input);
  } catch (err) {
    throw new MalformedInputError("Input is not valid UTF-8", undefined, { cause: err });
  }
  try {
    // Numbers stay as LosslessNumber so value fields see their wire text
    return parseJson(text);
  } catch (err) {
    throw new MalformedInputError(`Input is not valid JSON: ${errorMessage(err)}`, undefined, { cause: err });
  }
}

function decodeObject(raw: unknown, state: DecodeState, path: string): RegistryItem {
  if (!isJsonRecord(raw)) {
    throw new MalformedInputError(`Expected a JSON object at ${path}`, { path, received: describeJson(raw) });
  }

  const typeName = raw[DISCRIMINATOR_KEY];
  if (typeof typeName !== "string") {
    throw new MissingDiscriminatorError(`Object at ${path} has no string '${DISCRIMINATOR_KEY}'`, { path });
  }

  const shape = state.registry.lookup(typeName);
  if (!shape) {
    throw new UnsupportedTypeError(typeName, { path });
  }
  const fields = decodeFields(shape, raw, state, path);
  return { ...fields, [DISCRIMINATOR_KEY]: typeName };
}

function decodeFields(shape: AnyShapeDescriptor, raw: JsonRecord, state: DecodeState, path: string): JsonRecord {
  const fields: JsonRecord = {};

  for (const spec of shape.fields) {
    if (spec.skip) {
      continue;
    }
    const key = wireKeyOf(spec);
    if (key === DISCRIMINATOR_KEY || !Object.prototype.hasOwnProperty.call(raw, key)) {
      continue;
    }
    fields[spec.name] = decodeField(spec, raw[key], state, `${path}.${key}`);
  }

  return fields;
}

function decodeField(spec: FieldSpec, raw: unknown, state: DecodeState, path: string): unknown {
  switch (spec.kind) {
    case "value":
      return decodeTerm(raw, state, path);
    case "value-sequence":
      return requireArray(raw, path).map((element, index) => decodeTerm(element, state, `${path}[${index}]`));
    case "polymorphic":
      return decodeObject(raw, state, path);
    case "polymorphic-sequence":
      return requireArray(raw, path).map((element, index) => decodeObject(element, state, `${path}[${index}]`));
    case "scalar":
    case "structured-scalar":
      return decodeScalar(spec, raw, path);
    default:
      spec.kind satisfies never;
      throw new InvalidFieldShapeError(`Field at ${path} uses unsupported kind '${String(spec.kind)}'`, { path });
  }
}

function decodeTerm(raw: unknown, state: DecodeState, path: string): Value {
  try {
    return parseValue(raw, state.options);
  } catch (err) {
    if (err instanceof UnparsableValueError) {
      throw new UnparsableValueError(err.message, { ...err.details, path }, { cause: err });
    }
    throw err;
  }
}

function decodeScalar(spec: FieldSpec, raw: unknown, path: string): unknown {
  if (!spec.schema) {
    throw new InvalidFieldShapeError(`Field '${spec.name}' at ${path} has no schema`, { path });
  }
  const result = spec.schema.safeParse(toPlainJson(raw));
  if (!result.success) {
    const issues = result.error.errors.map((e) => ({ path: e.path.join("."), message: e.message }));
    throw new InvalidFieldShapeError(
      `Field '${spec.name}' at ${path} does not match its ${spec.kind}: ${issues.map((i) => i.message).join("; ")}`,
      { path, issues },
      { cause: result.error },
    );
  }
  return result.data;
}

function requireArray(raw: unknown, path: string): unknown[] {
  if (!Array.isArray(raw)) {
    throw new InvalidFieldShapeError(`Expected an array at ${path}`, { path, received: describeJson(raw) });
  }
  return raw;
}

function describeJson(raw: unknown): string {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "array";
  return typeof raw;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
