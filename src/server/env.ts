// src/server/env.ts

export type EnvSource = Record<string, string | undefined>;

export function envInt(name: string, def: number, env: EnvSource = process.env): number {
  const raw = env[name];
  if (!raw) return def;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : def;
}

export function envBool(name: string, def: boolean, env: EnvSource = process.env): boolean {
  const raw = env[name];
  if (raw === undefined) return def;
  return raw === '1' || raw.toLowerCase() === 'true' || raw.toLowerCase() === 'yes';
}

export function envStr(name: string, env: EnvSource = process.env): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}
