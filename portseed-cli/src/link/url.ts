const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1"]);

// scheme://[userinfo@]host:port followed by a path, query, fragment or the end
const AUTHORITY = /^([A-Za-z][A-Za-z0-9+.-]*:\/\/(?:[^@/?#]*@)?)([^/?#:@]+):(\d+)(?=[/?#]|$)/;

export interface LoopbackUrl {
  host: string;
  port: number;
}

export type LoopbackParse =
  | { ok: true; url: LoopbackUrl }
  | { ok: false; reason: string };

export function parseLoopbackUrl(raw: string): LoopbackParse {
  const value = raw.trim();
  if (!/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(value)) {
    return { ok: false, reason: "not a URL" };
  }

  const match = AUTHORITY.exec(value);
  if (!match) {
    const host = /^[^:]+:\/\/(?:[^@/?#]*@)?([^/?#:]*)/.exec(value)?.[1] ?? "";
    if (LOOPBACK_HOSTS.has(host.toLowerCase())) {
      return { ok: false, reason: "missing port" };
    }
    return { ok: false, reason: `host "${host}" is not loopback` };
  }

  const host = match[2];
  if (!LOOPBACK_HOSTS.has(host.toLowerCase())) {
    return { ok: false, reason: `host "${host}" is not loopback` };
  }

  const port = parseInt(match[3], 10);
  if (port > 65535) {
    return { ok: false, reason: `invalid port "${match[3]}"` };
  }
  return { ok: true, url: { host, port } };
}

/** Swaps only the port digits; the rest of the value is kept verbatim. */
export function replaceLoopbackPort(raw: string, port: number): string {
  const parsed = parseLoopbackUrl(raw);
  if (!parsed.ok) {
    throw new Error(parsed.reason);
  }
  const value = raw.trim();
  return value.replace(AUTHORITY, (_all, prefix: string, host: string) => `${prefix}${host}:${port}`);
}
