import type { PrimitiveType } from "./types.js";
import { INT, FLOAT, STRING, VOID } from "./types.js";

export type Value =
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "string"; value: string }
  | { kind: "null" };

export const NULL: Value = { kind: "null" };
export const TRUE: Value = { kind: "int", value: 1n };
export const FALSE: Value = { kind: "int", value: 0n };

/** Integer results wrap around at 64 bits. */
export function intValue(value: bigint): Value {
  return { kind: "int", value: BigInt.asIntN(64, value) };
}

export function floatValue(value: number): Value {
  return { kind: "float", value };
}

export function stringValue(value: string): Value {
  return { kind: "string", value };
}

/** There is no boolean value: truth is the integer 1, falsehood 0. */
export function boolValue(value: boolean): Value {
  return value ? TRUE : FALSE;
}

export function typeOfValue(value: Value): PrimitiveType {
  switch (value.kind) {
    case "int": return INT;
    case "float": return FLOAT;
    case "string": return STRING;
    case "null": return VOID;
  }
}

export function inspect(value: Value): string {
  switch (value.kind) {
    case "int": return value.value.toString();
    case "float": return Number.isInteger(value.value) ? value.value.toFixed(1) : String(value.value);
    case "string": return value.value;
    case "null": return "null";
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "int": return b.kind === "int" && a.value === b.value;
    case "float": return b.kind === "float" && a.value === b.value;
    case "string": return b.kind === "string" && a.value === b.value;
    case "null": return b.kind === "null";
  }
}

/**
 * Reads a value from command-line text: an integer when it is one, then a
 * float, otherwise the text itself as a string.
 */
export function valueFromText(text: string): Value {
  if (/^-?[0-9]+$/.test(text)) {
    const n = BigInt(text);
    if (BigInt.asIntN(64, n) === n) return intValue(n);
  }
  if (/^-?[0-9]+\.[0-9]*$/.test(text)) {
    return floatValue(Number(text));
  }
  return stringValue(text);
}
