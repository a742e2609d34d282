import { z, ZodType } from "zod";
import type { RegistryOptions } from "./config";
import {
  DuplicateRegistrationError,
  InvalidRegistrantError,
  LinkedQlConfigurationError,
  RegistryConfigurationError,
  RegistrySealedError,
  UnsupportedTypeError,
} from "./errors";
import { NOOP_LOGGER, type LinkedQlLogger } from "./logger";
import { DISCRIMINATOR_KEY, FIELD_KINDS, type AnyShapeDescriptor } from "./shape";

const fieldSpecSchema = z
  .object({
    name: z.string().min(1).refine((name) => name !== DISCRIMINATOR_KEY, {
      message: `'${DISCRIMINATOR_KEY}' is reserved for the discriminator`,
    }),
    kind: z.enum(FIELD_KINDS),
    wireName: z
      .string()
      .min(1)
      .refine((name) => name !== DISCRIMINATOR_KEY, {
        message: `'${DISCRIMINATOR_KEY}' is reserved for the discriminator`,
      })
      .optional(),
    skip: z.boolean(),
    schema: z.instanceof(ZodType).optional(),
  })
  .superRefine((spec, ctx) => {
    const needsSchema = spec.kind === "scalar" || spec.kind === "structured-scalar";
    if (needsSchema && !spec.schema && !spec.skip) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["schema"],
        message: `${spec.kind} field '${spec.name}' needs a schema`,
      });
    }
  });

const shapeDescriptorSchema = z
  .object({
    kind: z.literal("composite", {
      errorMap: () => ({ message: "only composite shapes may be registered" }),
    }),
    name: z.string().min(1),
    fields: z.array(fieldSpecSchema),
  })
  .superRefine((shape, ctx) => {
    const seen = new Set<string>();
    shape.fields.forEach((spec, index) => {
      if (seen.has(spec.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, "name"],
          message: `field '${spec.name}' is declared twice`,
        });
      }
      seen.add(spec.name);
    });
  });

/**
 * Discriminator name ↔ shape descriptor mapping.
 *
 * Populated during startup, then sealed. Decoding only reads it.
 */
export class TypeRegistry {
  private readonly shapesByName = new Map<string, AnyShapeDescriptor>();
  private readonly namesByShape = new Map<AnyShapeDescriptor, string>();
  private readonly logger: LinkedQlLogger;
  private isSealed = false;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  register(shape: AnyShapeDescriptor): this {
    const typeName = describeCandidate(shape);
    if (this.isSealed) {
      throw new RegistrySealedError(typeName);
    }

    const result = shapeDescriptorSchema.safeParse(shape);
    if (!result.success) {
      const problems = result.error.errors.map((e) =>
        e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message,
      );
      throw new InvalidRegistrantError(`Cannot register '${typeName}': ${problems.join("; ")}`, {
        typeName,
        problems,
      });
    }

    if (this.shapesByName.has(shape.name)) {
      throw new DuplicateRegistrationError(shape.name);
    }

    this.shapesByName.set(shape.name, shape);
    this.namesByShape.set(shape, shape.name);
    this.logger.debug("Registered item type", { typeName: shape.name, fields: shape.fields.length });
    return this;
  }

  lookup(typeName: string): AnyShapeDescriptor | undefined {
    return this.shapesByName.get(typeName);
  }

  require(typeName: string): AnyShapeDescriptor {
    const shape = this.shapesByName.get(typeName);
    if (!shape) {
      throw new UnsupportedTypeError(typeName);
    }
    return shape;
  }

  nameOf(shape: AnyShapeDescriptor): string | undefined {
    return this.namesByShape.get(shape);
  }

  has(typeName: string): boolean {
    return this.shapesByName.has(typeName);
  }

  names(): IterableIterator<string> {
    return this.shapesByName.keys();
  }

  entries(): IterableIterator<[string, AnyShapeDescriptor]> {
    return this.shapesByName.entries();
  }

  get size(): number {
    return this.shapesByName.size;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /** End the configuration phase. Further registrations throw. */
  seal(): this {
    if (!this.isSealed) {
      this.isSealed = true;
      this.logger.debug("Sealed type registry", { types: this.shapesByName.size });
    }
    return this;
  }
}

/**
 * Register every shape and return a sealed registry.
 *
 * All configuration problems are collected first and reported together in a
 * single `RegistryConfigurationError`.
 */
export function buildTypeRegistry(
  shapes: Iterable<AnyShapeDescriptor>,
  options: RegistryOptions = {},
): TypeRegistry {
  const registry = new TypeRegistry(options);
  const issues: LinkedQlConfigurationError[] = [];

  for (const shape of shapes) {
    try {
      registry.register(shape);
    } catch (err) {
      if (!(err instanceof LinkedQlConfigurationError)) {
        throw err;
      }
      issues.push(err);
    }
  }

  if (issues.length > 0) {
    const error = new RegistryConfigurationError(issues);
    (options.logger ?? NOOP_LOGGER).error(error.message, { codes: error.details?.codes });
    throw error;
  }

  return registry.seal();
}

function describeCandidate(candidate: unknown): string {
  if (typeof candidate === "object" && candidate !== null && "name" in candidate) {
    const { name } = candidate;
    if (typeof name === "string" && name.length > 0) {
      return name;
    }
  }
  return typeof candidate === "object" && candidate !== null ? "<unnamed>" : String(candidate);
}
