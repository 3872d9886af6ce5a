import type { CapabilityFn } from '../types/capability.js';

export const DEFAULT_PREFIX = 'Echo: ';

export type BuiltinCapabilityName = 'echo' | 'echo_with_prefix';

export const DEFAULT_CAPABILITY: BuiltinCapabilityName = 'echo';

/** Returns the input unchanged. */
export const echo: CapabilityFn = (text) => text;

/** Prepends `parameters.prefix` (default "Echo: ") with no separator. */
export const echoWithPrefix: CapabilityFn = (text, parameters) => {
  const prefix = parameters.prefix ?? DEFAULT_PREFIX;
  if (typeof prefix !== 'string') {
    throw new TypeError(`prefix must be a string, got ${typeof prefix}`);
  }
  return `${prefix}${text}`;
};

export const BUILTIN_CAPABILITIES = {
  echo,
  echo_with_prefix: echoWithPrefix,
} satisfies Record<BuiltinCapabilityName, CapabilityFn>;
