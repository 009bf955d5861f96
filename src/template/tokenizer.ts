import { Delimiters, DEFAULT_DELIMITERS } from '../shared/types';
import { TemplateSyntaxError } from '../shared/errors';

export type TagKind =
  | 'variable'
  | 'unescaped'
  | 'section'
  | 'inverted'
  | 'close'
  | 'partial'
  | 'comment'
  | 'set-delimiters';

export interface SourceSpan {
  start: number;
  end: number;
  line: number;
  column: number;
  /** True when the token starts at offset 0 or right after a newline */
  lineStart: boolean;
}

export interface TextToken extends SourceSpan {
  type: 'text';
  content: string;
}

export interface TagToken extends SourceSpan {
  type: 'tag';
  kind: TagKind;
  name: string;
  raw: string;
  standalone: boolean;
  /** Delimiters in effect once this tag has been read */
  delimiters: Delimiters;
}

export type Token = TextToken | TagToken;

const SIGILS: Partial<Record<string, TagKind>> = {
  '#': 'section',
  '^': 'inverted',
  '/': 'close',
  '>': 'partial',
  '!': 'comment',
  '&': 'unescaped',
  '{': 'unescaped',
  '=': 'set-delimiters'
};

const STANDALONE_KINDS: ReadonlySet<TagKind> = new Set<TagKind>([
  'section',
  'inverted',
  'close',
  'partial',
  'comment',
  'set-delimiters'
]);

const TRAILING_BLANK = /[ \t]*(?:\r?\n|$)/y;

/**
 * Maps offsets to 1-based line/column pairs.
 */
export class LineLocator {
  private readonly lineStarts: number[] = [0];

  constructor(source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }
}

/**
 * Whether the tag spanning `[start, end)` is alone on its line, apart from
 * spaces and tabs.
 */
export function isStandaloneSpan(template: string, start: number, end: number): boolean {
  let i = start - 1;
  while (i >= 0 && (template[i] === ' ' || template[i] === '\t')) {
    i--;
  }
  if (i >= 0 && template[i] !== '\n') {
    return false;
  }

  TRAILING_BLANK.lastIndex = end;
  return TRAILING_BLANK.test(template);
}

export function parseDelimiters(source: string): Delimiters | null {
  const parts = source.trim().split(/\s+/);
  if (parts.length !== 2 || parts.some(part => part === '' || part.includes('='))) {
    return null;
  }
  return [parts[0], parts[1]];
}

/**
 * Lazily splits `template` into text runs and tags. A `{{=a b=}}` tag
 * switches the delimiters for everything after it within this generator.
 */
export function* tokenize(
  template: string,
  delimiters: Delimiters = DEFAULT_DELIMITERS
): Generator<Token, void, undefined> {
  const locator = new LineLocator(template);
  let [open, close] = delimiters;
  let pos = 0;

  const span = (start: number, end: number): SourceSpan => ({
    start,
    end,
    ...locator.locate(start),
    lineStart: start === 0 || template[start - 1] === '\n'
  });

  while (pos < template.length) {
    const tagStart = template.indexOf(open, pos);

    if (tagStart === -1) {
      yield { type: 'text', content: template.slice(pos), ...span(pos, template.length) };
      return;
    }

    if (tagStart > pos) {
      yield { type: 'text', content: template.slice(pos, tagStart), ...span(pos, tagStart) };
    }

    const bodyStart = tagStart + open.length;
    const sigil = template.charAt(bodyStart);
    const kind = SIGILS[sigil] ?? 'variable';
    const terminator = sigil === '{' ? '}' + close : sigil === '=' ? '=' + close : close;
    const contentStart = kind === 'variable' ? bodyStart : bodyStart + 1;
    const terminatorAt = template.indexOf(terminator, contentStart);

    if (terminatorAt === -1) {
      const { line, column } = locator.locate(tagStart);
      throw new TemplateSyntaxError('Unclosed tag', line, column);
    }

    const end = terminatorAt + terminator.length;
    const name = template.slice(contentStart, terminatorAt).trim();

    if (kind === 'set-delimiters') {
      const next = parseDelimiters(name);
      if (!next) {
        const { line, column } = locator.locate(tagStart);
        throw new TemplateSyntaxError(`Invalid delimiter change '${name}'`, line, column);
      }
      [open, close] = next;
    }

    yield {
      type: 'tag',
      kind,
      name,
      raw: template.slice(tagStart, end),
      standalone: STANDALONE_KINDS.has(kind) && isStandaloneSpan(template, tagStart, end),
      delimiters: [open, close],
      ...span(tagStart, end)
    };

    pos = end;
  }
}
