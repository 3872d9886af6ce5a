const PLACEHOLDER = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

export type Environment = Record<string, string | undefined>;

/**
 * Replace every string value that is exactly `${VAR_NAME}` with the value of
 * that environment variable. Unset variables leave the placeholder as is.
 * Returns a new structure; the input is not modified.
 */
export function substituteEnvVars(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === 'string') {
    const match = PLACEHOLDER.exec(value);
    if (!match) return value;
    return env[match[1]] ?? value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVars(item, env);
    }
    return result;
  }
  return value;
}
