import {
  CompiledTemplate,
  Delimiters,
  RenderOptions,
  ResolvedRenderOptions
} from '../shared/types';
import { ConfigValidator } from '../config/config-validator';
import { StructuredLogger } from '../helpers/logger';
import { ContextStack } from './context';
import { parse, TemplateNode } from './parser';
import { toPartialSource } from './partials';
import { Renderer, ROOT_TEMPLATE } from './renderer';

export function resolveOptions(options: RenderOptions = {}): ResolvedRenderOptions {
  const { partials, logger, ...config } = options;
  const validated = new ConfigValidator().validate(config);

  return {
    escapeHtml: validated.escapeHtml,
    onMissingKey: validated.onMissingKey,
    keepUnresolved: validated.keepUnresolved,
    delimiters: validated.delimiters,
    maxDepth: validated.maxDepth,
    enableCache: validated.enableCache,
    partials: toPartialSource(partials),
    logger: logger || new StructuredLogger()
  };
}

export class TemplateEngine {
  private readonly options: ResolvedRenderOptions;
  private readonly renderer: Renderer;
  private templateCache = new Map<string, TemplateNode[]>();

  constructor(options: RenderOptions = {}) {
    this.options = resolveOptions(options);
    this.renderer = new Renderer(this.options, (template, delimiters) => this.parse(template, delimiters));
  }

  get settings(): ResolvedRenderOptions {
    return this.options;
  }

  get cacheSize(): number {
    return this.templateCache.size;
  }

  /**
   * Parse a template, reusing the cached tree for the same text and
   * delimiters when caching is enabled
   */
  parse(template: string, delimiters: Delimiters = this.options.delimiters): TemplateNode[] {
    if (!this.options.enableCache) {
      return parse(template, delimiters);
    }

    const key = `${delimiters[0]}\u0000${delimiters[1]}\u0000${template}`;
    const cached = this.templateCache.get(key);
    if (cached) {
      return cached;
    }

    const nodes = parse(template, delimiters);
    this.templateCache.set(key, nodes);
    return nodes;
  }

  compile(template: string): CompiledTemplate {
    const nodes = this.parse(template);

    return (data: unknown = {}) =>
      this.renderer.render(nodes, {
        stack: new ContextStack([data]),
        depth: 0,
        template: ROOT_TEMPLATE
      });
  }

  render(template: string, data: unknown = {}): string {
    return this.compile(template)(data);
  }

  clearCache(): void {
    this.templateCache.clear();
  }
}

/**
 * Render `template` once against `data`.
 */
export function render(template: string, data: unknown = {}, options: RenderOptions = {}): string {
  return new TemplateEngine({ ...options, enableCache: false }).render(template, data);
}
