/**
 * Manifold Values
 * Runtime value model and helpers shared by the evaluator and builtins
 */

/** Hash value: string keys, insertion ordered */
export interface ManifoldHash {
  [key: string]: ManifoldValue;
}

/** Any runtime value. `null` is the language's `undef`. */
export type ManifoldValue =
  | string
  | number
  | boolean
  | null
  | ManifoldValue[]
  | ManifoldHash;

export type ManifoldTypeName =
  | 'string'
  | 'number'
  | 'boolean'
  | 'undef'
  | 'array'
  | 'hash';

export function isHash(value: ManifoldValue): value is ManifoldHash {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Own entry of a hash. Members inherited from Object.prototype are not entries. */
export function hashGet(hash: ManifoldHash, key: string): ManifoldValue | undefined {
  return Object.hasOwn(hash, key) ? hash[key] : undefined;
}

/** Store an entry as an own property, `__proto__` included */
export function hashSet(hash: ManifoldHash, key: string, value: ManifoldValue): void {
  Object.defineProperty(hash, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function inferType(value: ManifoldValue): ManifoldTypeName {
  if (value === null) return 'undef';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'hash';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  return 'boolean';
}

/** false, undef and the empty string are false; everything else is true */
export function isTruthy(value: ManifoldValue): boolean {
  return value !== false && value !== null && value !== '';
}

export function deepEquals(a: ManifoldValue, b: ManifoldValue): boolean {
  if (a === b) return true;

  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, i) => {
        const other = b[i];
        return other !== undefined && deepEquals(item, other);
      })
    );
  }

  if (isHash(a) && isHash(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const left = hashGet(a, key);
      const right = hashGet(b, key);
      return left !== undefined && right !== undefined && deepEquals(left, right);
    });
  }

  return false;
}

/**
 * String form used by interpolation and resource titles.
 * undef renders as the empty string.
 */
export function formatValue(value: ManifoldValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatNested).join(', ')}]`;
  }
  const entries = Object.entries(value).map(
    ([key, item]) => `${key} => ${formatNested(item)}`
  );
  return `{${entries.join(', ')}}`;
}

function formatNested(value: ManifoldValue): string {
  if (value === null) return 'undef';
  if (typeof value === 'string') return `'${value}'`;
  return formatValue(value);
}
