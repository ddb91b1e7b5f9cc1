export type EnvEntry = [key: string, value: string];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isEnvFileName(name: string): boolean {
  return name === ".env" || name.startsWith(".env.");
}

export function isPortKey(key: string): boolean {
  const upper = key.toUpperCase();
  return upper === "PORT" || upper.endsWith("_PORT");
}

export function isValidEnvKey(key: string): boolean {
  return IDENTIFIER.test(key);
}

export function normalizeEnvKey(key: string): string {
  return key.trim().toUpperCase();
}

function unquote(raw: string): string {
  const value = raw.trim();
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2) {
    const close = value.indexOf(first, 1);
    if (close > 0) return value.slice(1, close);
  }
  const comment = value.search(/\s#/);
  return comment >= 0 ? value.slice(0, comment).trimEnd() : value;
}

/**
 * Parses dotenv-style content into entries in file order. Duplicate keys are
 * kept; callers decide which occurrence wins.
 */
export function parseDotenv(content: string): EnvEntry[] {
  const entries: EnvEntry[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    if (line.startsWith("export ")) {
      line = line.slice("export ".length).trimStart();
    }

    const eq = line.indexOf("=");
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    if (!key) continue;
    entries.push([key, unquote(line.slice(eq + 1))]);
  }

  return entries;
}

export function environToEntries(environ: Record<string, string | undefined>): EnvEntry[] {
  const entries: EnvEntry[] = [];
  for (const [key, value] of Object.entries(environ)) {
    if (value === undefined) continue;
    entries.push([key, value]);
  }
  return entries;
}
