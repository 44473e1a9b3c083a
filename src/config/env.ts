/** Reads one environment variable; undefined when unset. */
export type EnvReader = (key: string) => string | undefined;

export function processEnvReader(env: NodeJS.ProcessEnv = process.env): EnvReader {
  return (key) => env[key];
}

/** Trimmed value, or the fallback when unset or blank. */
export function readString(read: EnvReader, key: string, fallback: string): string {
  const raw = read(key);
  const v = raw === undefined ? '' : raw.trim();
  return v.length > 0 ? v : fallback;
}

export function readOptionalString(read: EnvReader, key: string): string | null {
  const raw = read(key);
  const v = raw === undefined ? '' : raw.trim();
  return v.length > 0 ? v : null;
}

/** Positive integer within `max`, else the fallback. Never throws. */
export function readPositiveInt(
  read: EnvReader,
  key: string,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = read(key);
  const n = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= max ? n : fallback;
}

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function readPort(read: EnvReader, key: string, fallback: number): number {
  return readPositiveInt(read, key, fallback, 65535);
}
