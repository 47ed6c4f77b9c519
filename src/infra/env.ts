// ---------------------------------------------------------------------------
// Environment value helpers (pure; callers pass the snapshot in)
// ---------------------------------------------------------------------------

export type EnvSnapshot = Readonly<Record<string, string>>;

/** Copy `process.env`-shaped input, dropping unset entries. */
export function snapshotEnv(env: NodeJS.ProcessEnv): EnvSnapshot {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return Object.freeze(out);
}

/** Returns the trimmed value, or `undefined` when unset or blank. */
export function readEnvString(env: EnvSnapshot, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

/** Accepts "true" or "1", case-insensitive. */
export function isTruthyEnvValue(raw: string | undefined): boolean {
  if (!raw) {
    return false;
  }
  const normalized = raw.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

/**
 * Boolean with a default: unset/blank keeps the default, "false"/"0"/"no"/"off"
 * turn it off, anything truthy turns it on.
 */
export function readEnvFlag(env: EnvSnapshot, key: string, fallback: boolean): boolean {
  const raw = readEnvString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return fallback;
}
