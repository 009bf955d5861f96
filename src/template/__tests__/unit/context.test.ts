import { describe, it, expect } from '@jest/globals';
import { ContextStack } from '../../context';

describe('ContextStack', () => {
  it('should search frames innermost first', () => {
    const stack = new ContextStack([{ name: 'outer', kept: 1 }]);
    stack.push({ name: 'inner' });

    expect(stack.lookup('name')).toEqual({ found: true, value: 'inner' });
    expect(stack.lookup('kept')).toEqual({ found: true, value: 1 });
  });

  it('should resolve the dot to the top frame', () => {
    const stack = new ContextStack(['root']);
    stack.push(42);

    expect(stack.lookup('.')).toEqual({ found: true, value: 42 });
    expect(new ContextStack().lookup('.')).toEqual({ found: false });
  });

  it('should follow dotted names inside the first match only', () => {
    const stack = new ContextStack([{ a: { b: { c: 'deep' } }, x: 'root-x' }]);
    stack.push({ a: { b: {} } });

    expect(stack.lookup('a.b.c')).toEqual({ found: false });
    expect(stack.lookup('x')).toEqual({ found: true, value: 'root-x' });
  });

  it('should resolve a full dotted path', () => {
    const stack = new ContextStack([{ person: { address: { city: 'Springfield' } } }]);

    expect(stack.lookup('person.address.city')).toEqual({ found: true, value: 'Springfield' });
  });

  it('should stop at primitives part way through a path', () => {
    const stack = new ContextStack([{ a: 'text' }]);

    expect(stack.lookup('a.length')).toEqual({ found: false });
  });

  it('should pop the frame pushed by with even when the callback throws', () => {
    const stack = new ContextStack([{}]);

    expect(() =>
      stack.with({ temp: true }, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(stack.depth).toBe(1);
    expect(stack.with({ v: 2 }, () => stack.lookup('v'))).toEqual({ found: true, value: 2 });
    expect(stack.depth).toBe(1);
  });
});
