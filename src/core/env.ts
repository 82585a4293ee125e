export type Env = Readonly<Record<string, string | undefined>>;

const ENV_REF_RE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expands `$VAR` and `${VAR}` references inside a string.
 * Unset or blank variables are left as written.
 */
export function expandEnvVars(value: string, env: Env): string {
  return value.replace(ENV_REF_RE, (match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    if (!name) return match;
    const v = env[name]?.trim();
    return v ? v : match;
  });
}

/** Expands a value that must consist of a single env reference; null when the variable is unset. */
export function expandEnvToken(value: string, env: Env): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(trimmed) ?? /^\$([A-Za-z_][A-Za-z0-9_]*)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

export function hasUnexpandedEnvRef(value: string): boolean {
  return new RegExp(ENV_REF_RE.source).test(value);
}
