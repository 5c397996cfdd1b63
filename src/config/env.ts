// ${NAME} or ${NAME:-fallback}
const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match, key: string, fallback: string | undefined) => {
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

export function findUnresolvedEnvVars(config: unknown, prefix = ""): string[] {
  if (typeof config === "string") {
    return [...config.matchAll(ENV_PATTERN)].map((match) => `${prefix}: \${${match[1]}}`);
  }
  if (Array.isArray(config)) {
    return config.flatMap((item, index) => findUnresolvedEnvVars(item, `${prefix}.${index}`));
  }
  if (isPlainObject(config)) {
    return Object.entries(config).flatMap(([key, value]) =>
      findUnresolvedEnvVars(value, prefix ? `${prefix}.${key}` : key),
    );
  }
  return [];
}
