/**
 * Type guards for values read from external JSON
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow a property path through nested records
 *
 * @example
 * fieldAt(ingress, 'status', 'loadBalancer', 'ingress')
 */
export function fieldAt(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function numberField(value: unknown, ...path: string[]): number | undefined {
  const field = fieldAt(value, ...path);
  return typeof field === 'number' ? field : undefined;
}

export function stringField(value: unknown, ...path: string[]): string | undefined {
  const field = fieldAt(value, ...path);
  return typeof field === 'string' ? field : undefined;
}

export function arrayField(value: unknown, ...path: string[]): unknown[] {
  const field = fieldAt(value, ...path);
  return Array.isArray(field) ? field : [];
}
