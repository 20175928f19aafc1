/**
 * INPUT: untyped JSON values (data files, request bodies)
 * OUTPUT: narrowed values, or an Error naming the offending location
 * POS: utility module, shape checks shared by the data loaders and API routers
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function requireRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${where}: expected an object`);
  return value;
}

export function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

export function requireStringArray(
  obj: Record<string, unknown>,
  key: string,
  where: string,
  nonEmpty = false,
): string[] {
  const value = obj[key];
  if (!isStringArray(value)) throw new Error(`${where}: "${key}" must be an array of strings`);
  if (nonEmpty && value.length === 0) throw new Error(`${where}: "${key}" must not be empty`);
  return value;
}

/** Accepts either a string or an array of lines joined with newlines */
export function requireText(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (isStringArray(value) && value.length > 0) return value.join('\n');
  return requireString(obj, key, where);
}

export function compilePattern(source: string, where: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${where}: invalid pattern "${source}" (${reason})`);
  }
}

export function compilePatterns(sources: readonly string[], where: string): RegExp[] {
  return sources.map((s) => compilePattern(s, where));
}
