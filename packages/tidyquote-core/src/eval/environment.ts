/**
 * Environment - chained name-to-binding scopes
 *
 * Lookup walks the parent chain and the first scope that defines a name
 * wins. The engine itself only reads environments; new bindings come from
 * the host evaluator (`define`, parameter binding).
 */

import { UnboundSymbolError } from '../errors.js';
import type { Value } from './values.js';
import type { LazyPromise } from './promise.js';
import type { CallFrame } from '../quote/capture.js';

/**
 * Placeholder bound to a declared parameter the caller did not supply
 */
export class MissingArgument {
  static readonly instance = new MissingArgument();

  private constructor() {}
}

export const theMissingArg = MissingArgument.instance;

export type Binding = Value | LazyPromise | MissingArgument;

export type BindingSource = ReadonlyMap<string, Binding> | Readonly<Record<string, Binding>>;

function toEntries(source: BindingSource): Iterable<[string, Binding]> {
  return source instanceof Map ? source.entries() : Object.entries(source);
}

export class Environment {
  private static nextId = 0;

  readonly id: number;
  private readonly bindings: Map<string, Binding> = new Map();

  constructor(
    bindings: BindingSource | null = null,
    readonly parent: Environment | null = null,
    readonly frame: CallFrame | null = null,
  ) {
    this.id = Environment.nextId++;
    if (bindings) {
      for (const [name, binding] of toEntries(bindings)) {
        this.bindings.set(name, binding);
      }
    }
  }

  /**
   * Look up a name along the chain; throws UnboundSymbolError on a miss
   */
  lookup(name: string): Binding {
    const binding = this.find(name);
    if (binding === undefined) {
      throw new UnboundSymbolError(name);
    }
    return binding;
  }

  /**
   * Non-throwing lookup
   */
  find(name: string): Binding | undefined {
    return this.scopeOf(name)?.bindings.get(name);
  }

  /**
   * Innermost scope along the chain that binds `name`
   */
  scopeOf(name: string): Environment | null {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      if (env.bindings.has(name)) {
        return env;
      }
    }
    return null;
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  /**
   * Create a child scope. Ancestors are never modified.
   */
  extend(bindings: BindingSource | null = null, frame: CallFrame | null = null): Environment {
    const child = new Environment(bindings, this, frame);
    if (process.env.DEBUG_ENV) {
      console.error(`[Environment] env#${this.id} -> env#${child.id}: ${child.bindings.size} bindings`);
    }
    return child;
  }

  /**
   * Add or replace a binding in this scope (host evaluator only)
   */
  define(name: string, binding: Binding): void {
    this.bindings.set(name, binding);
  }

  ownNames(): string[] {
    return Array.from(this.bindings.keys());
  }

  ownBinding(name: string): Binding | undefined {
    return this.bindings.get(name);
  }

  /**
   * Closest call frame along the chain, if any
   */
  nearestFrame(): CallFrame | null {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      if (env.frame) {
        return env.frame;
      }
    }
    return null;
  }
}
