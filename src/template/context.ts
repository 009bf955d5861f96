import { Lookup, lookupKey } from './values';

/**
 * Scope frames searched innermost-first. Frames are pushed and popped in
 * strict LIFO order around sections and lambda renders.
 */
export class ContextStack {
  private readonly frames: unknown[];

  constructor(frames: readonly unknown[] = []) {
    this.frames = [...frames];
  }

  get depth(): number {
    return this.frames.length;
  }

  top(): unknown {
    return this.frames[this.frames.length - 1];
  }

  push(frame: unknown): void {
    this.frames.push(frame);
  }

  pop(): void {
    this.frames.pop();
  }

  /**
   * Runs `fn` with `frame` pushed, popping it again however `fn` exits.
   */
  with<T>(frame: unknown, fn: () => T): T {
    this.push(frame);
    try {
      return fn();
    } finally {
      this.pop();
    }
  }

  /**
   * Resolves a dotted name. The first segment is searched through every
   * frame; later segments only inside the value the previous one produced.
   */
  lookup(name: string): Lookup {
    if (name === '.') {
      return this.frames.length > 0 ? { found: true, value: this.top() } : { found: false };
    }

    const [head, ...rest] = name.split('.');
    let result: Lookup = { found: false };

    for (let i = this.frames.length - 1; i >= 0; i--) {
      result = lookupKey(this.frames[i], head);
      if (result.found) {
        break;
      }
    }

    for (const segment of rest) {
      if (!result.found) {
        break;
      }
      result = lookupKey(result.value, segment);
    }

    return result;
  }
}
