import { ConfigError } from '../config.js';

export interface ParseCorsOptions {
  /** Permits "*" (CORS_DEV=1 only). */
  allowWildcardDev?: boolean;
}

function normalizeOrigin(origin: string): string {
  const s = origin.trim();
  try {
    const u = new URL(s);
    const proto = u.protocol.toLowerCase();
    const host = u.hostname.toLowerCase();
    const port = u.port ? `:${u.port}` : '';
    if (!proto || !host) return s;
    return `${proto}//${host}${port}`;
  } catch {
    return s.toLowerCase();
  }
}

/**
 * Parses CORS_ORIGINS. Items are trimmed, scheme and host lowercased, and
 * duplicates dropped. An empty list means CORS stays closed.
 */
export function parseCorsCsv(input: string, opts: ParseCorsOptions = {}): string[] {
  const items = input.split(',').map((s) => s.trim()).filter(Boolean);

  const out = new Set<string>();
  for (const raw of items) {
    if (raw === '*') {
      if (!opts.allowWildcardDev) throw new ConfigError(['CORS_ORIGINS: wildcard * requires CORS_DEV=1']);
      out.add('*');
      continue;
    }
    out.add(normalizeOrigin(raw));
  }
  return Array.from(out);
}
