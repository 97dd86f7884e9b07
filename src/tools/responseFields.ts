/**
 * Type guards for reading fields out of Unity responses without casting.
 */

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function getBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  return typeof value === "boolean" ? value : undefined;
}

/** Entries of a list field, keeping only object-shaped items. */
export function getObjectList(
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown>[] {
  const value = obj[key];
  return Array.isArray(value) ? value.filter(isObject) : [];
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}
