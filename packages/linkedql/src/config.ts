/**
 * Registry and decoder options.
 */

import { NOOP_LOGGER, type LinkedQlLogger } from "./logger";

/**
 * How non-integer numbers are rendered into `xsd:float` literals.
 *
 * - `"fixed"`: six fractional digits, `3.5` becomes `"3.500000"`
 * - `"shortest"`: the shortest text that reads back to the same number
 */
export type FloatFormat = "fixed" | "shortest";

export interface RegistryOptions {
  /** Logger for registration events (default: no-op) */
  logger?: LinkedQlLogger;
}

export interface ValueParserOptions {
  /** Rendering of non-integer numbers (default: "fixed") */
  floatFormat?: FloatFormat;
}

export interface DecoderOptions extends ValueParserOptions {
  /** Logger for decode events (default: no-op) */
  logger?: LinkedQlLogger;
}

export type ResolvedDecoderOptions = Required<DecoderOptions>;

export const DEFAULT_FLOAT_FORMAT: FloatFormat = "fixed";

export function resolveDecoderOptions(options: DecoderOptions = {}): ResolvedDecoderOptions {
  return {
    logger: options.logger ?? NOOP_LOGGER,
    floatFormat: options.floatFormat ?? DEFAULT_FLOAT_FORMAT,
  };
}
