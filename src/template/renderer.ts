import { Delimiters, Lambda, Logger, ResolvedRenderOptions } from '../shared/types';
import {
  MissingKeyError,
  MissingPartialError,
  RecursionLimitExceeded,
  ResolutionSite
} from '../shared/errors';
import { ContextStack } from './context';
import { parse, PartialNode, SectionNode, TemplateNode, VariableNode } from './parser';
import { classify, escapeHtml, isFalsy, stringify } from './values';

export type ParseFunction = (template: string, delimiters: Delimiters) => TemplateNode[];

export interface RenderState {
  stack: ContextStack;
  /** Section, partial and lambda nesting level */
  depth: number;
  /** Label used in diagnostics: the root template or the partial being rendered */
  template: string;
}

export const ROOT_TEMPLATE = '<template>';

export class Renderer {
  private logger: Logger;

  constructor(
    private readonly options: ResolvedRenderOptions,
    private readonly parseTemplate: ParseFunction = parse
  ) {
    this.logger = options.logger.child({ component: 'renderer' });
  }

  render(nodes: readonly TemplateNode[], state: RenderState): string {
    let output = '';
    for (const node of nodes) {
      output += this.renderNode(node, state);
    }
    return output;
  }

  private renderNode(node: TemplateNode, state: RenderState): string {
    switch (node.type) {
      case 'text':
        return node.content;
      case 'variable':
        return this.renderVariable(node, state);
      case 'section':
        return this.renderSection(node, state);
      case 'inverted':
        return this.renderInverted(node, state);
      case 'partial':
        return this.renderPartial(node, state);
      case 'comment':
      case 'set-delimiters':
        return '';
    }
  }

  private renderVariable(node: VariableNode, state: RenderState): string {
    const lookup = state.stack.lookup(node.name);

    if (!lookup.found) {
      this.reportMissingKey(node.name, this.site(node, state));
      if (this.options.keepUnresolved) {
        const [open, close] = this.options.delimiters;
        return `${open} ${node.name} ${close}`;
      }
      return '';
    }

    let value = classify(lookup.value);
    if (value.kind === 'lambda') {
      const { fn } = value;
      value = classify(fn());
    }

    const text = stringify(value);
    return node.escape && this.options.escapeHtml ? escapeHtml(text) : text;
  }

  private renderSection(node: SectionNode, state: RenderState): string {
    const lookup = state.stack.lookup(node.name);

    if (!lookup.found) {
      this.reportMissingKey(node.name, this.site(node, state));
      return '';
    }

    const value = classify(lookup.value);
    if (isFalsy(value)) {
      return '';
    }

    const inner: RenderState = { ...state, depth: this.enter(state.depth) };

    switch (value.kind) {
      case 'sequence':
        return value.items
          .map(item => state.stack.with(item, () => this.render(node.children, inner)))
          .join('');
      case 'mapping':
        return state.stack.with(value.value, () => this.render(node.children, inner));
      case 'lambda':
        return this.renderLambdaSection(node, value.fn, inner);
      default:
        return this.render(node.children, inner);
    }
  }

  private renderInverted(node: SectionNode, state: RenderState): string {
    const lookup = state.stack.lookup(node.name);

    if (!lookup.found) {
      this.reportMissingKey(node.name, this.site(node, state));
    } else if (!isFalsy(classify(lookup.value))) {
      return '';
    }
    return this.render(node.children, { ...state, depth: this.enter(state.depth) });
  }

  /**
   * Calls the lambda with the unparsed section body and a render callback,
   * then renders whatever it returns as a template with the section's
   * delimiters. Lambda output is parsed on every call, never cached.
   */
  private renderLambdaSection(node: SectionNode, fn: Lambda, state: RenderState): string {
    const renderText = (template: string, data?: unknown): string => {
      const nodes = parse(template, node.delimiters);
      if (data === undefined) {
        return this.render(nodes, state);
      }
      return state.stack.with(data, () => this.render(nodes, state));
    };

    const result = fn(node.raw, renderText);
    return renderText(stringify(classify(result)));
  }

  private renderPartial(node: PartialNode, state: RenderState): string {
    const template = this.options.partials.get(node.name);

    if (template === undefined) {
      this.reportMissingPartial(node.name, this.site(node, state));
      return '';
    }

    const depth = this.enter(state.depth);
    const source = node.indentation ? indent(template, node.indentation) : template;
    const nodes = this.parseTemplate(source, this.options.delimiters);

    return this.render(nodes, {
      stack: state.stack,
      depth,
      template: `partial '${node.name}'`
    });
  }

  private enter(depth: number): number {
    const next = depth + 1;
    if (next > this.options.maxDepth) {
      throw new RecursionLimitExceeded(next, this.options.maxDepth);
    }
    return next;
  }

  private site(node: { line: number; column: number }, state: RenderState): ResolutionSite {
    return { line: node.line, column: node.column, template: state.template };
  }

  private reportMissingKey(key: string, site: ResolutionSite): void {
    switch (this.options.onMissingKey) {
      case 'error':
        throw new MissingKeyError(key, site);
      case 'warn':
        this.logger.warn(`Could not find key '${key}'`, { key, ...site });
        break;
      case 'ignore':
        break;
    }
  }

  private reportMissingPartial(partial: string, site: ResolutionSite): void {
    switch (this.options.onMissingKey) {
      case 'error':
        throw new MissingPartialError(partial, site);
      case 'warn':
        this.logger.warn(`Could not find partial '${partial}'`, { partial, ...site });
        break;
      case 'ignore':
        break;
    }
  }
}

/**
 * Prefixes every non-empty line of `template` with `indentation`.
 */
export function indent(template: string, indentation: string): string {
  return template.replace(/^(?=.)/gm, indentation);
}
