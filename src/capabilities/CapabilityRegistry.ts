import type { CapabilityFn } from '../types/capability.js';
import { BUILTIN_CAPABILITIES } from './builtins.js';

/** Maps capability names to text transforms. */
export class CapabilityRegistry {
  private readonly capabilities = new Map<string, CapabilityFn>();

  /** A registry holding `echo` and `echo_with_prefix`. */
  static withBuiltins(): CapabilityRegistry {
    const registry = new CapabilityRegistry();
    for (const [name, fn] of Object.entries(BUILTIN_CAPABILITIES)) {
      registry.register(name, fn);
    }
    return registry;
  }

  /** Register a capability. A later registration under the same name replaces the earlier one. */
  register(name: string, fn: CapabilityFn): this {
    this.capabilities.set(name, fn);
    return this;
  }

  resolve(name: string): CapabilityFn | undefined {
    return this.capabilities.get(name);
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  names(): string[] {
    return [...this.capabilities.keys()];
  }
}
