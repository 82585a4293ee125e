const SAFE_TOKEN_RE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/** Quotes a token for a POSIX shell only when it needs it. */
export function shellQuote(token: string): string {
  return SAFE_TOKEN_RE.test(token) ? token : bashSingleQuote(token);
}

export function renderCommandLine(argv: readonly string[]): string {
  return argv.map(shellQuote).join(" ");
}
