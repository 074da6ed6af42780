const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replaces `${NAME}` and `${NAME:-fallback}` in every string of the config tree.
 * Unset names without a fallback are left as written.
 */
export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match: string, key: string, fallback?: string) => {
      const value = env[key];
      if (value !== undefined && value !== "") {
        return value;
      }
      return fallback ?? match;
    });
  }

  if (Array.isArray(config)) {
    return config.map((item) => replaceEnvVars(item, env));
  }

  if (isPlainObject(config)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = replaceEnvVars(value, env);
    }
    return result;
  }

  return config;
}
