import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  DuplicateRegistrationError,
  InvalidRegistrantError,
  RegistryConfigurationError,
  RegistrySealedError,
  UnsupportedTypeError,
} from "./errors";
import type { LinkedQlLogger } from "./logger";
import { defineShape, field } from "./shape";
import { buildTypeRegistry, TypeRegistry } from "./typeRegistry";

const Vertex = defineShape("linkedql:Vertex", { values: field.values() });
const Limit = defineShape("linkedql:Limit", {
  from: field.item(),
  limit: field.scalar(z.number().int()),
});

function recordingLogger(): LinkedQlLogger & { debug: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("TypeRegistry.register", () => {
  it("maps names to shapes and back", () => {
    const registry = new TypeRegistry().register(Vertex).register(Limit);

    expect(registry.lookup("linkedql:Vertex")).toBe(Vertex);
    expect(registry.lookup("linkedql:Limit")).toBe(Limit);
    expect(registry.nameOf(Vertex)).toBe("linkedql:Vertex");
    expect(registry.has("linkedql:Limit")).toBe(true);
    expect(registry.size).toBe(2);
    expect([...registry.names()]).toEqual(["linkedql:Vertex", "linkedql:Limit"]);
  });

  it("returns undefined for unknown names", () => {
    const registry = new TypeRegistry().register(Vertex);
    expect(registry.lookup("linkedql:Out")).toBeUndefined();
    expect(registry.nameOf(Limit)).toBeUndefined();
  });

  it("rejects a second registration under the same name and keeps the first", () => {
    const registry = new TypeRegistry().register(Vertex);
    const impostor = defineShape("linkedql:Vertex", { other: field.value() });

    expect(() => registry.register(impostor)).toThrowError(DuplicateRegistrationError);
    expect(registry.lookup("linkedql:Vertex")).toBe(Vertex);
    expect(registry.nameOf(impostor)).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it("rejects atomic registrants", () => {
    const registry = new TypeRegistry();
    const atomic = JSON.parse('{"kind":"atomic","name":"xsd:string"}');

    expect(() => registry.register(atomic)).toThrowError(InvalidRegistrantError);
    expect(() => registry.register(atomic)).toThrowError("only composite shapes may be registered");
    expect(registry.has("xsd:string")).toBe(false);
  });

  it("rejects candidates that are not objects", () => {
    const registry = new TypeRegistry();
    expect(() => registry.register(JSON.parse('"linkedql:Vertex"'))).toThrowError(InvalidRegistrantError);
  });

  it("names candidates without a name as unnamed", () => {
    const registry = new TypeRegistry();
    const nameless = JSON.parse('{"kind":"composite","fields":[]}');

    expect(() => registry.register(nameless)).toThrowError("Cannot register '<unnamed>': name: Required");
  });

  it("rejects an empty discriminator name", () => {
    const registry = new TypeRegistry();
    expect(() => registry.register(defineShape("", {}))).toThrowError(InvalidRegistrantError);
  });

  it("rejects fields that claim the discriminator key", () => {
    const registry = new TypeRegistry();
    const byName = defineShape("ex:A", { "@type": field.value() });
    const byWire = defineShape("ex:B", { kind: field.value().wire("@type") });

    expect(() => registry.register(byName)).toThrowError(InvalidRegistrantError);
    expect(() => registry.register(byWire)).toThrowError(InvalidRegistrantError);
  });

  it("rejects scalar fields without a schema", () => {
    const registry = new TypeRegistry();
    const shape = JSON.parse('{"kind":"composite","name":"ex:C","fields":[{"name":"n","kind":"scalar","skip":false}]}');

    expect(() => registry.register(shape)).toThrowError("fields.0.schema: scalar field 'n' needs a schema");
  });

  it("logs each registration at debug level", () => {
    const logger = recordingLogger();
    new TypeRegistry({ logger }).register(Limit);

    expect(logger.debug).toHaveBeenCalledWith("Registered item type", { typeName: "linkedql:Limit", fields: 2 });
  });
});

describe("TypeRegistry.require", () => {
  it("throws UnsupportedTypeError carrying the unknown name", () => {
    const registry = new TypeRegistry().register(Vertex);

    try {
      registry.require("linkedql:Out");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedTypeError);
      expect(err).toMatchObject({ code: "UNSUPPORTED_TYPE", typeName: "linkedql:Out" });
    }
  });
});

describe("TypeRegistry.seal", () => {
  it("refuses registrations once sealed", () => {
    const registry = new TypeRegistry().register(Vertex).seal();

    expect(registry.sealed).toBe(true);
    expect(() => registry.register(Limit)).toThrowError(RegistrySealedError);
    expect(registry.has("linkedql:Limit")).toBe(false);
  });
});

describe("buildTypeRegistry", () => {
  it("returns a sealed registry holding every shape", () => {
    const registry = buildTypeRegistry([Vertex, Limit]);

    expect(registry.sealed).toBe(true);
    expect(registry.lookup("linkedql:Limit")).toBe(Limit);
  });

  it("collects every configuration problem into one error", () => {
    const logger = recordingLogger();
    const duplicate = defineShape("linkedql:Vertex", {});
    const atomic = JSON.parse('{"kind":"atomic","name":"xsd:string"}');

    try {
      buildTypeRegistry([Vertex, duplicate, atomic, Limit], { logger });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RegistryConfigurationError);
      if (!(err instanceof RegistryConfigurationError)) return;
      expect(err.issues.map((issue) => issue.code)).toEqual(["DUPLICATE_REGISTRATION", "INVALID_REGISTRANT"]);
      expect(err.message.split("\n")[0]).toBe("Registry configuration failed:");
      expect(logger.error).toHaveBeenCalledTimes(1);
    }
  });
});
