import { describe, it, expect } from '@jest/globals';
import { classify, isFalsy, stringify, escapeHtml, lookupKey } from '../../values';

class Address {
  constructor(public street: string) {}

  get label(): string {
    return `at ${this.street}`;
  }
}

class Money {
  constructor(private cents: number) {}

  toString(): string {
    return `$${(this.cents / 100).toFixed(2)}`;
  }
}

describe('classify', () => {
  it('should map JavaScript values onto template values', () => {
    const fn = () => 'x';

    expect(classify(undefined)).toEqual({ kind: 'null' });
    expect(classify(null)).toEqual({ kind: 'null' });
    expect(classify(true)).toEqual({ kind: 'boolean', value: true });
    expect(classify(7)).toEqual({ kind: 'number', value: 7 });
    expect(classify(BigInt(12))).toEqual({ kind: 'number', value: BigInt(12) });
    expect(classify('s')).toEqual({ kind: 'string', value: 's' });
    expect(classify([1])).toEqual({ kind: 'sequence', items: [1] });
    expect(classify({ a: 1 })).toEqual({ kind: 'mapping', value: { a: 1 } });
    expect(classify(fn)).toEqual({ kind: 'lambda', fn });
  });

  it('should treat iterable objects other than Map as sequences', () => {
    expect(classify(new Set([1, 2]))).toEqual({ kind: 'sequence', items: [1, 2] });
    expect(classify(new Map([['k', 'v']]))).toEqual({ kind: 'mapping', value: new Map([['k', 'v']]) });
  });
});

describe('isFalsy', () => {
  it.each([
    ['null', null, true],
    ['false', false, true],
    ['empty string', '', true],
    ['empty list', [], true],
    ['zero', 0, false],
    ['empty object', {}, false],
    ['true', true, false],
    ['non-empty string', 'no', false],
    ['non-empty list', [0], false]
  ])('should judge %s', (_label, value, expected) => {
    expect(isFalsy(classify(value))).toBe(expected);
  });
});

describe('stringify', () => {
  it('should render scalars', () => {
    expect(stringify(classify(null))).toBe('');
    expect(stringify(classify(false))).toBe('false');
    expect(stringify(classify(1.5))).toBe('1.5');
    expect(stringify(classify('text'))).toBe('text');
  });

  it('should join sequences with commas', () => {
    expect(stringify(classify([1, 'two', null, [3, 4]]))).toBe('1,two,,3,4');
  });

  it('should use a custom toString on objects', () => {
    expect(stringify(classify(new Money(1250)))).toBe('$12.50');
  });

  it('should fall back to JSON for plain objects', () => {
    expect(stringify(classify({ a: 1, b: [true] }))).toBe('{"a":1,"b":[true]}');
  });

  it('should fall back to String when JSON fails', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(stringify(classify(cyclic))).toBe('[object Object]');
  });

  it('should print bigints past the safe integer range exactly', () => {
    expect(stringify(classify(BigInt('9007199254740993')))).toBe('9007199254740993');
  });

  it('should render lambdas as nothing', () => {
    expect(stringify(classify(() => 'ignored'))).toBe('');
  });
});

describe('escapeHtml', () => {
  it('should escape the five HTML special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;'
    );
  });

  it('should escape ampersands only once', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});

describe('lookupKey', () => {
  it('should find own properties including undefined ones', () => {
    expect(lookupKey({ a: 1 }, 'a')).toEqual({ found: true, value: 1 });
    expect(lookupKey({ a: undefined }, 'a')).toEqual({ found: true, value: undefined });
    expect(lookupKey({ a: 1 }, 'b')).toEqual({ found: false });
  });

  it('should find Map entries', () => {
    expect(lookupKey(new Map([['k', 'v']]), 'k')).toEqual({ found: true, value: 'v' });
    expect(lookupKey(new Map(), 'size')).toEqual({ found: false });
  });

  it('should see class members but not Object.prototype', () => {
    const address = new Address('Elm');

    expect(lookupKey(address, 'label')).toEqual({ found: true, value: 'at Elm' });
    expect(lookupKey(address, 'toString')).toEqual({ found: false });
    expect(lookupKey({}, 'constructor')).toEqual({ found: false });
  });

  it('should bind methods to the object they were found on', () => {
    class Counter {
      count = 3;

      next(): number {
        return this.count + 1;
      }
    }

    const lookup = lookupKey(new Counter(), 'next');
    if (!lookup.found || typeof lookup.value !== 'function') {
      throw new Error('expected a method');
    }

    expect(lookup.value()).toBe(4);
  });

  it('should index arrays by position and length', () => {
    expect(lookupKey(['x', 'y'], '1')).toEqual({ found: true, value: 'y' });
    expect(lookupKey(['x', 'y'], 'length')).toEqual({ found: true, value: 2 });
  });

  it('should never find keys on primitives', () => {
    expect(lookupKey('text', 'length')).toEqual({ found: false });
    expect(lookupKey(null, 'a')).toEqual({ found: false });
  });
});
