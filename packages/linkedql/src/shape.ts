/**
 * Shape definitions: the schema table the item decoder walks.
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { defineShape, field, type ItemOf } from "@linkedql/core";
 *
 * export const Vertex = defineShape("linkedql:Vertex", {
 *   values: field.values(),
 * });
 *
 * export const Out = defineShape("linkedql:Out", {
 *   from: field.item(),
 *   properties: field.item(),
 *   tags: field.structured(z.array(z.string())),
 *   cache: field.scalar(z.boolean()).skip(),
 * });
 *
 * type OutStep = ItemOf<typeof Out>;
 * ```
 */

import type { z, ZodTypeAny } from "zod";
import type { Value } from "@linkedql/quad";

/** Wire key holding the discriminator of every item */
export const DISCRIMINATOR_KEY = "@type";

/** Wire-name override meaning "never deserialize this field" */
export const SKIP_WIRE_NAME = "-";

export const FIELD_KINDS = [
  "scalar",
  "structured-scalar",
  "value",
  "value-sequence",
  "polymorphic",
  "polymorphic-sequence",
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

/** A decoded item. The discriminator doubles as the item's IRI identity. */
export interface RegistryItem<TName extends string = string> {
  readonly "@type": TName;
}

// ============================================================
// Field Definitions
// ============================================================

/** A field definition with fluent modifiers */
export interface FieldDef<T> {
  /** Phantom type for inference */
  readonly _type?: T;
  readonly kind: FieldKind;
  /** Wire key, when it differs from the property name */
  readonly wireName?: string;
  readonly skipped: boolean;
  /** Decoder for scalar and structured-scalar fields */
  readonly schema?: ZodTypeAny;
  /** Read the field from a different wire key; `"-"` skips it */
  wire(name: string): FieldDef<T>;
  /** Never populate this field, whatever the wire object holds */
  skip(): FieldDef<T>;
}

export type FieldMap = Record<string, FieldDef<unknown>>;

interface FieldState {
  kind: FieldKind;
  wireName?: string;
  skipped: boolean;
  schema?: ZodTypeAny;
}

function createFieldDef<T>(state: FieldState): FieldDef<T> {
  return {
    kind: state.kind,
    wireName: state.wireName,
    skipped: state.skipped,
    schema: state.schema,

    wire(name: string): FieldDef<T> {
      return createFieldDef<T>({
        ...state,
        wireName: name,
        skipped: state.skipped || name === SKIP_WIRE_NAME,
      });
    },

    skip(): FieldDef<T> {
      return createFieldDef<T>({ ...state, skipped: true });
    },
  };
}

export interface FieldBuilder {
  /** Plain JSON scalar decoded by a zod schema */
  scalar<S extends ZodTypeAny>(schema: S): FieldDef<z.output<S>>;
  /** Non-polymorphic JSON structure (object or array) decoded by a zod schema */
  structured<S extends ZodTypeAny>(schema: S): FieldDef<z.output<S>>;
  /** Single RDF term */
  value(): FieldDef<Value>;
  /** Ordered list of RDF terms */
  values(): FieldDef<Value[]>;
  /** Nested item resolved by its own discriminator */
  item(): FieldDef<RegistryItem>;
  /** Ordered list of nested items */
  items(): FieldDef<RegistryItem[]>;
}

export const field: FieldBuilder = {
  scalar<S extends ZodTypeAny>(schema: S): FieldDef<z.output<S>> {
    return createFieldDef<z.output<S>>({ kind: "scalar", skipped: false, schema });
  },
  structured<S extends ZodTypeAny>(schema: S): FieldDef<z.output<S>> {
    return createFieldDef<z.output<S>>({ kind: "structured-scalar", skipped: false, schema });
  },
  value: () => createFieldDef<Value>({ kind: "value", skipped: false }),
  values: () => createFieldDef<Value[]>({ kind: "value-sequence", skipped: false }),
  item: () => createFieldDef<RegistryItem>({ kind: "polymorphic", skipped: false }),
  items: () => createFieldDef<RegistryItem[]>({ kind: "polymorphic-sequence", skipped: false }),
};

// ============================================================
// Shape Descriptors
// ============================================================

export interface FieldSpec {
  /** Property name on the decoded item */
  readonly name: string;
  readonly kind: FieldKind;
  readonly wireName?: string;
  readonly skip: boolean;
  readonly schema?: ZodTypeAny;
}

export interface ShapeDescriptor<TName extends string = string, TFields extends FieldMap = FieldMap> {
  readonly kind: "composite";
  readonly name: TName;
  /** Fields in declaration order */
  readonly fields: readonly FieldSpec[];
  /** Phantom type for inference */
  readonly _fields?: TFields;
}

export type AnyShapeDescriptor = ShapeDescriptor<string, FieldMap>;

export type FieldValue<F> = F extends FieldDef<infer T> ? T : never;

/**
 * Infer the decoded item type of a shape. Every field is optional: a key
 * missing on the wire stays absent on the item.
 */
export type ItemOf<S> =
  S extends ShapeDescriptor<infer TName, infer TFields>
    ? RegistryItem<TName> & { readonly [K in keyof TFields]?: FieldValue<TFields[K]> }
    : never;

export function defineShape<TName extends string, TFields extends FieldMap>(
  name: TName,
  fields: TFields,
): ShapeDescriptor<TName, TFields> {
  return {
    kind: "composite",
    name,
    fields: Object.entries(fields).map(([fieldName, def]) => ({
      name: fieldName,
      kind: def.kind,
      wireName: def.wireName,
      skip: def.skipped,
      schema: def.schema,
    })),
  };
}

/** Wire key the decoder reads for a field */
export function wireKeyOf(spec: FieldSpec): string {
  return spec.wireName ?? spec.name;
}

/** The `Type()` of an item: its discriminator / IRI identity */
export function itemType<TName extends string>(item: RegistryItem<TName>): TName {
  return item[DISCRIMINATOR_KEY];
}

/** Narrow a decoded item to the concrete shape it was built from */
export function isItemOf<S extends AnyShapeDescriptor>(
  shape: S,
  item: RegistryItem,
): item is RegistryItem & ItemOf<S> {
  return item[DISCRIMINATOR_KEY] === shape.name;
}
