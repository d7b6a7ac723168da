import type { PrimitiveType } from "./types.js";
import { UNKNOWN } from "./types.js";
import type { Value } from "./values.js";

/** Lexically scoped name table. Inner scopes shadow outer ones. */
export class Environment<T> {
  private scopes: Map<string, T>[] = [new Map()];

  enterScope(): void {
    this.scopes.push(new Map());
  }

  exitScope(): void {
    if (this.scopes.length === 1) {
      throw new Error("Cannot exit the global scope");
    }
    this.scopes.pop();
  }

  /** Binds `name` in the innermost scope, replacing any binding it already has there. */
  set(name: string, value: T): T {
    this.scopes[this.scopes.length - 1].set(name, value);
    return value;
  }

  lookup(name: string): T | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i].get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }
}

export class TypeEnvironment extends Environment<PrimitiveType> {
  /** The declared type of `name`, or "unknown" when it was never declared. */
  get(name: string): PrimitiveType {
    return this.lookup(name) ?? UNKNOWN;
  }
}

export class EvalEnvironment extends Environment<Value> {}
