/**
 * Lexical scoping environment for the Brook interpreter.
 *
 * Each environment holds a map of variable bindings and a reference
 * to its parent scope. Environments are shared by reference: a call
 * frame, any closures created inside it and any child scopes all point
 * at the same object, so a write through one is seen by all of them.
 */

import { BrookValue } from './values';
import { UndefinedVariableError } from './errors';

interface Binding {
  value: BrookValue;
}

export class Environment {
  private vars: Map<string, Binding>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Create a scope enclosed by `parent`.
   */
  static childOf(parent: Environment): Environment {
    return new Environment(parent);
  }

  /**
   * Find the nearest environment on the chain, starting with this one,
   * that has its own binding for `name`.
   */
  resolve(name: string): Environment | null {
    let env: Environment | null = this;
    while (env !== null) {
      if (env.vars.has(name)) return env;
      env = env.parent;
    }
    return null;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): BrookValue {
    const binding = this.resolve(name)?.vars.get(name);
    if (binding === undefined) {
      throw new UndefinedVariableError(name);
    }
    return binding.value;
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    return this.resolve(name) !== null;
  }

  /**
   * Overwrite an existing binding in the nearest scope that defines it.
   * Never creates a binding.
   */
  assign(name: string, value: BrookValue): void {
    const binding = this.resolve(name)?.vars.get(name);
    if (binding === undefined) {
      throw new UndefinedVariableError(name);
    }
    binding.value = value;
  }

  /**
   * Define or overwrite a variable in this scope only.
   */
  define(name: string, value: BrookValue): void {
    const binding = this.vars.get(name);
    if (binding !== undefined) {
      binding.value = value;
      return;
    }
    this.vars.set(name, { value });
  }

  /**
   * Names bound directly in this scope, in definition order.
   */
  names(): string[] {
    return [...this.vars.keys()];
  }

  /** The outermost scope on the chain. */
  root(): Environment {
    let env: Environment = this;
    while (env.parent !== null) env = env.parent;
    return env;
  }

  getParent(): Environment | null {
    return this.parent;
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return Environment.childOf(this);
  }
}
