/**
 * Runtime value types for the Loa language.
 * Every expression in Loa evaluates to a LoaValue.
 */

import type * as AST from '../parser/ast';
import type { Environment } from './environment';

export type LoaValue =
  | LoaNumber
  | LoaString
  | LoaBoolean
  | LoaNil
  | LoaFunction;

export interface LoaNumber {
  kind: 'number';
  value: number;
}

export interface LoaString {
  kind: 'string';
  value: string;
}

export interface LoaBoolean {
  kind: 'boolean';
  value: boolean;
}

export interface LoaNil {
  kind: 'nil';
}

/** A user-defined function together with the scope it was defined in. */
export interface LoaFunction {
  kind: 'function';
  name: string;
  params: string[];
  body: AST.Statement[];
  closure: Environment;
}

// ─── Constructors ────────────────────────────────────

export function loaNumber(value: number): LoaNumber {
  return { kind: 'number', value };
}

export function loaString(value: string): LoaString {
  return { kind: 'string', value };
}

export function loaBoolean(value: boolean): LoaBoolean {
  return { kind: 'boolean', value };
}

const NIL: LoaNil = Object.freeze({ kind: 'nil' });

export function loaNil(): LoaNil {
  return NIL;
}

export function loaFunction(
  name: string,
  params: string[],
  body: AST.Statement[],
  closure: Environment,
): LoaFunction {
  return { kind: 'function', name, params, body, closure };
}

// ─── Utilities ───────────────────────────────────────

/** `false`, `nil` and the number 0 are falsy; everything else is truthy. */
export function isTruthy(value: LoaValue): boolean {
  switch (value.kind) {
    case 'nil': return false;
    case 'boolean': return value.value;
    case 'number': return value.value !== 0;
    default: return true;
  }
}

function formatNumber(n: number): string {
  // String() already yields the shortest round-tripping decimal; -0 prints as 0
  return String(n);
}

export function valueToString(value: LoaValue): string {
  switch (value.kind) {
    case 'string': return value.value;
    case 'number': return formatNumber(value.value);
    case 'boolean': return String(value.value);
    case 'nil': return 'nil';
    case 'function': return `<fun ${value.name}>`;
  }
}

/** Structural equality for primitives, identity for functions. */
export function valuesEqual(a: LoaValue, b: LoaValue): boolean {
  switch (a.kind) {
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'nil': return b.kind === 'nil';
    case 'function': return a === b;
  }
}
