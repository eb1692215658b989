// Environment parsing shared by the gateway and the worker config loaders.
// Unset and blank variables read as undefined; bad values fail at startup.

export function env(name: string): string | undefined {
  const v = process.env[name];
  return typeof v === 'string' && v.trim() ? v.trim() : undefined;
}

export function requireEnv(name: string): string {
  const v = env(name);
  if (!v) throw new Error(`BLOCKED: ${name} is REQUIRED`);
  return v;
}

/** Clamped to [min, max]; unparsable values fall back to `def`. */
export function parseIntEnv(name: string, def: number, min: number, max: number): number {
  const raw = env(name);
  if (!raw) return def;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return def;
  return Math.min(Math.max(n, min), max);
}

export function parseBoolEnv(name: string, def: boolean): boolean {
  const raw = (env(name) || '').toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return def;
}

/**
 * Case-insensitive match against a fixed set. Unset returns `def`;
 * anything outside the set throws so a typo never picks a default silently.
 */
export function parseEnumEnv<T extends string>(name: string, values: readonly T[], def: T): T {
  const raw = env(name);
  if (!raw) return def;
  const lowered = raw.toLowerCase();
  const match = values.find((v) => v === lowered);
  if (match === undefined) {
    throw new Error(`BLOCKED: ${name} must be one of ${values.join(', ')} (got "${raw}")`);
  }
  return match;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function safeJsonParse(text: string): unknown | null {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}
