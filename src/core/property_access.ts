/**
 * @fileoverview Typed property access over loosely shaped structures
 *
 * Parser output and host-supplied records change shape between versions
 * (a plain map in one release, an object with accessors in the next).
 * `getProperty` reads such values without untyped reflection: structural
 * lookup first, then a `get<Name>()` accessor, else `undefined`.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function accessorName(name: string): string {
  return `get${name.charAt(0).toUpperCase()}${name.slice(1)}`;
}

/**
 * Read `name` from a Map, an object or an object exposing `get<Name>()`.
 */
export function getProperty(source: unknown, name: string): unknown {
  if (source instanceof Map) {
    return source.get(name);
  }
  if (!isRecord(source)) {
    return undefined;
  }
  if (Object.prototype.hasOwnProperty.call(source, name)) {
    return source[name];
  }
  const accessor = source[accessorName(name)];
  if (typeof accessor === 'function') {
    const value: unknown = accessor.call(source);
    return value;
  }
  return undefined;
}

export function hasProperty(source: unknown, name: string): boolean {
  const value = getProperty(source, name);
  return value !== undefined && value !== null;
}

export function getString(source: unknown, name: string): string | undefined {
  const value = getProperty(source, name);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(source: unknown, name: string): number | undefined {
  const value = getProperty(source, name);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getArray(source: unknown, name: string): readonly unknown[] | undefined {
  const value = getProperty(source, name);
  return Array.isArray(value) ? value : undefined;
}

/** First property among `names` that is present, for fields with historical aliases. */
export function getFirstProperty(source: unknown, names: readonly string[]): unknown {
  for (const name of names) {
    const value = getProperty(source, name);
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}
