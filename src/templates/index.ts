/**
 * Template Engine: barrel export
 */

export type {
  VariableKind,
  VariableDeclaration,
  OutputDeclaration,
  UserValues,
  VariableValue,
} from "./types.js";
export { VARIABLE_KINDS } from "./types.js";

export { render, resolveEffectiveValues } from "./renderer.js";
export { validate } from "./validate.js";
export { toVariableValue, encodeValue, encodeJsonValue } from "./values.js";
export {
  KNOWN_NAMESPACES,
  interpolationNamespace,
  isInterpolationStart,
  findClosingBrace,
  skipStringLiteral,
} from "./scanner.js";
