/**
 * @linkedql/core - Registry and decoder for polymorphic JSON-LD items
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { buildTypeRegistry, defineShape, field, ItemDecoder } from "@linkedql/core";
 *
 * const Has = defineShape("linkedql:Has", {
 *   from: field.item(),
 *   property: field.value(),
 *   values: field.values(),
 * });
 * const Vertex = defineShape("linkedql:Vertex", { values: field.values() });
 *
 * const decoder = new ItemDecoder(buildTypeRegistry([Has, Vertex]));
 * const step = decoder.decode(requestBody);
 * ```
 */

// ============================================================
// Shapes
// ============================================================

export {
  defineShape,
  field,
  isItemOf,
  itemType,
  wireKeyOf,
  DISCRIMINATOR_KEY,
  FIELD_KINDS,
  SKIP_WIRE_NAME,
} from "./shape";
export type {
  AnyShapeDescriptor,
  FieldBuilder,
  FieldDef,
  FieldKind,
  FieldMap,
  FieldSpec,
  FieldValue,
  ItemOf,
  RegistryItem,
  ShapeDescriptor,
} from "./shape";

// ============================================================
// Registry
// ============================================================

export { TypeRegistry, buildTypeRegistry } from "./typeRegistry";

// ============================================================
// Decoding
// ============================================================

export { ItemDecoder, decodeItem, type DecoderInput } from "./decoder";
export { parseValue, formatFloat } from "./valueParser";

// ============================================================
// Configuration & Logging
// ============================================================

export { DEFAULT_FLOAT_FORMAT, resolveDecoderOptions } from "./config";
export type {
  DecoderOptions,
  FloatFormat,
  RegistryOptions,
  ResolvedDecoderOptions,
  ValueParserOptions,
} from "./config";
export { NOOP_LOGGER, createConsoleLogger } from "./logger";
export type { ConsoleLoggerOptions, LinkedQlLogger, LogLevel } from "./logger";

// ============================================================
// Errors
// ============================================================

export {
  LinkedQlError,
  LinkedQlDecodeError,
  LinkedQlConfigurationError,
  MalformedInputError,
  MissingDiscriminatorError,
  UnsupportedTypeError,
  UnparsableValueError,
  InvalidFieldShapeError,
  DuplicateRegistrationError,
  InvalidRegistrantError,
  RegistrySealedError,
  RegistryConfigurationError,
  type LinkedQlErrorCode,
} from "./errors";
