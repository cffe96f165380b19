import type { CallableFill } from '../types/index.js';
import { ElementConfigurationError } from '../exception/index.js';

/**
 * Named custom fill functions that JSON screen maps reference through
 * a callable element's `fn` field.
 */
export class CallableRegistry {
  private callables = new Map<string, CallableFill>();

  /**
   * Register a function. Throws if the name is already taken.
   */
  register(name: string, fn: CallableFill): void {
    if (this.callables.has(name)) {
      throw new Error(`Callable "${name}" is already registered`);
    }
    this.callables.set(name, fn);
  }

  get(name: string): CallableFill | undefined {
    return this.callables.get(name);
  }

  /**
   * Get a function by name, failing as a configuration error when it is
   * not registered.
   */
  resolve(name: string, elementName?: string): CallableFill {
    const fn = this.callables.get(name);
    if (!fn) {
      const owner = elementName ? ` (element: ${elementName})` : '';
      throw new ElementConfigurationError(`Callable "${name}" is not registered${owner}`);
    }
    return fn;
  }

  list(): string[] {
    return Array.from(this.callables.keys());
  }
}
