export {
  blankNode,
  formatValue,
  iri,
  isValue,
  langString,
  plainString,
  typedLiteral,
  valueEquals,
} from "./value";
export type { BlankNode, Iri, LangString, PlainString, TermType, TypedLiteral, Value } from "./value";
export { XSD_BOOLEAN, XSD_FLOAT, XSD_INTEGER, XSD_NAMESPACE, XSD_STRING } from "./xsd";
