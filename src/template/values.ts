import { Lambda } from '../shared/types';

/**
 * Context data arrives as `unknown`; every rendering decision goes through
 * this closed set of shapes instead.
 */
export type TemplateValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number | bigint }
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'mapping'; value: object }
  | { kind: 'lambda'; fn: Lambda };

export function isLambda(value: unknown): value is Lambda {
  return typeof value === 'function';
}

export function classify(value: unknown): TemplateValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }
  if (isLambda(value)) {
    return { kind: 'lambda', fn: value };
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (isIterable(value)) {
    return { kind: 'sequence', items: Array.from(value) };
  }
  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
    case 'bigint':
      return { kind: 'number', value };
    case 'string':
      return { kind: 'string', value };
    case 'object':
      return { kind: 'mapping', value };
    default:
      return { kind: 'string', value: String(value) };
  }
}

/**
 * Sets, generators and other iterable objects loop like arrays. Strings and
 * `Map`s do not.
 */
function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Map) &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}

/**
 * `false`, missing, `[]` and `''` are falsy. `0` and `{}` are not.
 */
export function isFalsy(value: TemplateValue): boolean {
  switch (value.kind) {
    case 'null':
      return true;
    case 'boolean':
      return !value.value;
    case 'string':
      return value.value === '';
    case 'sequence':
      return value.items.length === 0;
    default:
      return false;
  }
}

export function stringify(value: TemplateValue): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'boolean':
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'sequence':
      return value.items.map(item => stringify(classify(item))).join(',');
    case 'mapping':
      return hasOwnToString(value.value) ? String(value.value) : toJson(value.value);
    case 'lambda':
      return '';
  }
}

// Cyclic objects and nested bigints cannot be serialised
function toJson(value: object): string {
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return String(value);
  }
}

function hasOwnToString(value: object): boolean {
  return !(value instanceof Map) && value.toString !== Object.prototype.toString;
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export type Lookup = { found: true; value: unknown } | { found: false };

const MISSING: Lookup = { found: false };

/**
 * Single-level key lookup inside one value. Own properties, `Map` entries
 * and inherited members of class instances are visible; members that come
 * from `Object.prototype` are not. Functions found on an object come back
 * bound to it, so methods keep their `this`.
 */
export function lookupKey(scope: unknown, key: string): Lookup {
  if (scope === null || typeof scope !== 'object') {
    return MISSING;
  }
  if (scope instanceof Map) {
    return scope.has(key) ? { found: true, value: scope.get(key) } : MISSING;
  }
  if (Object.prototype.hasOwnProperty.call(scope, key) || (key in scope && !(key in Object.prototype))) {
    return { found: true, value: bindTo(scope, Reflect.get(scope, key)) };
  }
  return MISSING;
}

function bindTo(owner: object, value: unknown): unknown {
  return typeof value === 'function' ? value.bind(owner) : value;
}
