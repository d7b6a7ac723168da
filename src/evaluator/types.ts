export type PrimitiveType = "int" | "string" | "float" | "void" | "unknown";

// Built-in types
export const INT: PrimitiveType = "int";
export const STRING: PrimitiveType = "string";
export const FLOAT: PrimitiveType = "float";
export const VOID: PrimitiveType = "void";
export const UNKNOWN: PrimitiveType = "unknown";

export function isNumeric(type: PrimitiveType): boolean {
  return type === INT || type === FLOAT;
}
