export type TermType = "string" | "typed-literal" | "lang-string" | "iri" | "blank-node";

export interface PlainString {
  readonly termType: "string";
  readonly value: string;
}

export interface TypedLiteral {
  readonly termType: "typed-literal";
  readonly value: string;
  /** Datatype IRI */
  readonly datatype: string;
}

export interface LangString {
  readonly termType: "lang-string";
  readonly value: string;
  readonly language: string;
}

export interface Iri {
  readonly termType: "iri";
  readonly value: string;
}

export interface BlankNode {
  readonly termType: "blank-node";
  /** Local id, without the `_:` prefix */
  readonly id: string;
}

export type Value = PlainString | TypedLiteral | LangString | Iri | BlankNode;

const TERM_TYPES: readonly TermType[] = ["string", "typed-literal", "lang-string", "iri", "blank-node"];

export function plainString(value: string): PlainString {
  return { termType: "string", value };
}

export function typedLiteral(value: string, datatype: string): TypedLiteral {
  return { termType: "typed-literal", value, datatype };
}

export function langString(value: string, language: string): LangString {
  return { termType: "lang-string", value, language };
}

export function iri(value: string): Iri {
  return { termType: "iri", value };
}

export function blankNode(id: string): BlankNode {
  return { termType: "blank-node", id };
}

export function isValue(candidate: unknown): candidate is Value {
  if (!candidate || typeof candidate !== "object" || !("termType" in candidate)) {
    return false;
  }
  const { termType } = candidate;
  return typeof termType === "string" && TERM_TYPES.some((known) => known === termType);
}

export function valueEquals(a: Value, b: Value): boolean {
  switch (a.termType) {
    case "string":
    case "iri":
      return b.termType === a.termType && b.value === a.value;
    case "typed-literal":
      return b.termType === "typed-literal" && b.value === a.value && b.datatype === a.datatype;
    case "lang-string":
      // Language tags compare case-insensitively (BCP 47)
      return (
        b.termType === "lang-string" &&
        b.value === a.value &&
        b.language.toLowerCase() === a.language.toLowerCase()
      );
    case "blank-node":
      return b.termType === "blank-node" && b.id === a.id;
    default:
      a satisfies never;
      return false;
  }
}

/**
 * Render a value in N-Triples term syntax, e.g. `"chat"@fr` or
 * `"42"^^<http://www.w3.org/2001/XMLSchema#integer>`.
 */
export function formatValue(value: Value): string {
  switch (value.termType) {
    case "string":
      return quote(value.value);
    case "typed-literal":
      return `${quote(value.value)}^^<${value.datatype}>`;
    case "lang-string":
      return `${quote(value.value)}@${value.language}`;
    case "iri":
      return `<${value.value}>`;
    case "blank-node":
      return `_:${value.id}`;
    default:
      value satisfies never;
      throw new Error("Unknown term type");
  }
}

function quote(text: string): string {
  const escaped = text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
  return `"${escaped}"`;
}
