export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

export function readBoolean(
  data: Record<string, unknown>,
  key: string
): boolean | null {
  const value = data[key];
  if (typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Optional numeric field: undefined when absent or not a number.
 */
export function readOptionalNumber(
  data: Record<string, unknown>,
  key: string
): number | undefined {
  return readNumber(data, key) ?? undefined;
}

export function readEnum<T extends string>(
  data: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | null {
  const value = data[key];
  if (typeof value !== 'string') {
    return null;
  }
  return allowed.find((entry) => entry === value) ?? null;
}
