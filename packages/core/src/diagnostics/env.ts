/**
 * packages/core/src/diagnostics/env.ts — Environment readers shared by config and logging.
 *
 * Core stays host-agnostic: `process` is read through globalThis so the
 * engine loads in hosts without Node's globals.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function hostEnv(): EnvSource {
  const g = globalThis as { process?: { env?: EnvSource } };
  return g.process?.env ?? {};
}

export function readEnv(env: EnvSource, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: EnvSource, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function envPositiveInt(env: EnvSource, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}
