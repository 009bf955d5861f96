export type PlainObject = Record<string, unknown>;

/**
 * Check if value is a plain object
 */
export function isPlainObject(value: unknown): value is PlainObject {
  return !!value && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Deep merge utility for configuration objects
 */
export const deepmerge = {
  /**
   * Merge multiple objects deeply, later objects winning
   */
  all(objects: PlainObject[]): PlainObject {
    return objects.reduce<PlainObject>((result, obj) => this.merge(result, obj), {});
  },

  /**
   * Merge two objects deeply
   */
  merge(target: PlainObject, source: unknown): PlainObject {
    if (!isPlainObject(source)) {
      return target;
    }

    const output: PlainObject = { ...target };

    for (const key of Object.keys(source)) {
      const value = source[key];
      if (value === undefined) {
        continue;
      }

      const existing = output[key];
      if (isPlainObject(value)) {
        output[key] = isPlainObject(existing) ? this.merge(existing, value) : { ...value };
      } else if (Array.isArray(value)) {
        // For arrays, replace rather than merge
        output[key] = [...value];
      } else {
        output[key] = value;
      }
    }

    return output;
  }
};

/**
 * Set a value at a dot-separated path, creating intermediate objects
 */
export function setNestedValue(obj: PlainObject, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[key] = created;
      current = created;
    }
  }

  current[keys[keys.length - 1]] = value;
}
