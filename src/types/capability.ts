/** Free-form parameters passed to a capability, e.g. `{ prefix: 'Bot: ' }`. */
export type CapabilityParameters = Record<string, unknown>;

/**
 * A named text transform. May be async so a capability can suspend
 * (for example on a model call) without affecting event order.
 */
export type CapabilityFn = (
  text: string,
  parameters: CapabilityParameters,
) => string | Promise<string>;
