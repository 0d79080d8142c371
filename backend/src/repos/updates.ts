/**
 * Split a patch into `$set` / `$unset`: a key present with `undefined` clears
 * the stored field, a missing key leaves it alone. MongoDB rejects empty
 * operators, so they are left out.
 */
export function toUpdate(patch: object): { $set?: Record<string, unknown>; $unset?: Record<string, 1> } {
  const $set: Record<string, unknown> = {};
  const $unset: Record<string, 1> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      $unset[key] = 1;
    } else {
      $set[key] = value;
    }
  }

  return {
    ...(Object.keys($set).length > 0 ? { $set } : {}),
    ...(Object.keys($unset).length > 0 ? { $unset } : {}),
  };
}

/**
 * Copy without `undefined` values, for full-document replacements.
 */
export function compact<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
