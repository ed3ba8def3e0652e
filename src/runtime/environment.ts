import { LoaValue } from './values';
import { Position, RuntimeError } from '../errors';

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain. Function values keep a
 * reference to the scope they were defined in, so a frame lives as long as
 * any closure over it.
 */
export class Environment {
  private bindings: Map<string, LoaValue> = new Map();

  constructor(private readonly parent: Environment | null = null) {}

  /** Bind a name in this scope, shadowing any outer binding. */
  define(name: string, value: LoaValue): void {
    this.bindings.set(name, value);
  }

  get(name: string, position: Position = { line: 0, column: 0 }): LoaValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new RuntimeError('UndefinedVariable', `Undefined variable '${name}'`, position);
    }
    return value;
  }

  lookup(name: string): LoaValue | undefined {
    const own = this.bindings.get(name);
    if (own !== undefined) return own;
    return this.parent?.lookup(name);
  }

  /**
   * Set a variable in the nearest scope where it's already defined,
   * or in the current scope if not found anywhere.
   */
  set(name: string, value: LoaValue): void {
    const owner = this.resolve(name);
    (owner ?? this).bindings.set(name, value);
  }

  has(name: string): boolean {
    return this.resolve(name) !== null;
  }

  child(): Environment {
    return new Environment(this);
  }

  /**
   * Get all bindings in this scope (not including parent).
   */
  getOwnBindings(): Map<string, LoaValue> {
    return new Map(this.bindings);
  }

  private resolve(name: string): Environment | null {
    if (this.bindings.has(name)) return this;
    return this.parent ? this.parent.resolve(name) : null;
  }
}
