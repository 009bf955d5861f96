import { Delimiters, DEFAULT_DELIMITERS } from '../shared/types';
import { TemplateSyntaxError } from '../shared/errors';
import { tokenize, TagToken } from './tokenizer';

export interface TextNode {
  type: 'text';
  content: string;
}

export interface VariableNode {
  type: 'variable';
  name: string;
  escape: boolean;
  line: number;
  column: number;
}

export interface SectionNode {
  type: 'section' | 'inverted';
  name: string;
  children: TemplateNode[];
  /** Unparsed source between the open and close tags, handed to lambdas */
  raw: string;
  delimiters: Delimiters;
  line: number;
  column: number;
}

export interface PartialNode {
  type: 'partial';
  name: string;
  /** Whitespace stripped from in front of a standalone partial tag */
  indentation: string;
  line: number;
  column: number;
}

export interface CommentNode {
  type: 'comment';
  content: string;
}

export interface DelimiterNode {
  type: 'set-delimiters';
  delimiters: Delimiters;
}

export type TemplateNode =
  | TextNode
  | VariableNode
  | SectionNode
  | PartialNode
  | CommentNode
  | DelimiterNode;

interface OpenSection {
  node: SectionNode;
  token: TagToken;
}

const LEADING_LINE_END = /^[ \t]*(?:\r?\n)?/;
const TRAILING_INDENT = /[ \t]*$/;

/**
 * Builds the node tree for `template`, nesting sections and trimming the
 * lines of standalone tags.
 */
export function parse(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  let previousText: TextNode | undefined;
  let trimNext = false;

  const children = (): TemplateNode[] =>
    stack.length > 0 ? stack[stack.length - 1].node.children : root;

  for (const token of tokenize(template, delimiters)) {
    if (token.type === 'text') {
      let content = token.content;
      if (trimNext) {
        content = content.replace(LEADING_LINE_END, '');
        trimNext = false;
      }
      if (content === '') {
        previousText = undefined;
        continue;
      }
      previousText = { type: 'text', content };
      children().push(previousText);
      continue;
    }

    let indentation = '';
    if (token.standalone) {
      indentation = stripIndentation(previousText, children());
    }
    trimNext = token.standalone;
    previousText = undefined;

    const { line, column } = token;

    switch (token.kind) {
      case 'variable':
      case 'unescaped':
        children().push({
          type: 'variable',
          name: token.name,
          escape: token.kind === 'variable',
          line,
          column
        });
        break;

      case 'section':
      case 'inverted': {
        const node: SectionNode = {
          type: token.kind,
          name: token.name,
          children: [],
          raw: '',
          delimiters: token.delimiters,
          line,
          column
        };
        children().push(node);
        stack.push({ node, token });
        break;
      }

      case 'close': {
        const open = stack.pop();
        if (!open) {
          throw new TemplateSyntaxError(`Unexpected close of section '${token.name}'`, line, column);
        }
        if (open.node.name !== token.name) {
          throw new TemplateSyntaxError(
            `Mismatched section close '${token.name}' for section '${open.node.name}'`,
            line,
            column
          );
        }
        open.node.raw = template.slice(open.token.end, token.start);
        break;
      }

      case 'partial':
        children().push({ type: 'partial', name: token.name, indentation, line, column });
        break;

      case 'comment':
        children().push({ type: 'comment', content: token.name });
        break;

      case 'set-delimiters':
        children().push({ type: 'set-delimiters', delimiters: token.delimiters });
        break;
    }
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new TemplateSyntaxError(
      `Unclosed section '${unclosed.node.name}'`,
      unclosed.node.line,
      unclosed.node.column
    );
  }

  return root;
}

/**
 * Removes the spaces/tabs ahead of a standalone tag from the text node just
 * before it, dropping that node when nothing else is left in it.
 */
function stripIndentation(previous: TextNode | undefined, siblings: TemplateNode[]): string {
  if (!previous) {
    return '';
  }

  const indentation = TRAILING_INDENT.exec(previous.content)?.[0] ?? '';
  previous.content = previous.content.slice(0, previous.content.length - indentation.length);

  if (previous.content === '' && siblings[siblings.length - 1] === previous) {
    siblings.pop();
  }
  return indentation;
}
