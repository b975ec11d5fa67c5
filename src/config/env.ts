export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim();
}

export function readEnvRaw(name: string): string | undefined {
  return process.env[name];
}

export function readListEnv(name: string): string[] | null {
  const raw = readEnv(name);
  if (!raw) return null;
  const values = raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
  return values.length ? values : null;
}
