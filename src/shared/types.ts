// Base types
export type Delimiters = readonly [open: string, close: string];
export type OnMissingKey = 'ignore' | 'warn' | 'error';

export const DEFAULT_DELIMITERS: Delimiters = ['{{', '}}'];

// Logger interface
export interface Logger {
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error | Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

// Partial lookup, supplied by whoever loads templates
export interface PartialSource {
  get(name: string): string | undefined;
}

/**
 * Render callback handed to section lambdas. Renders `template` with the
 * section's delimiters against the current context, optionally pushing
 * `data` as an extra innermost frame.
 */
export type LambdaRenderer = (template: string, data?: unknown) => string;

/**
 * A callable context value. Variable tags call it with no arguments; section
 * tags call it with the raw section body and a {@link LambdaRenderer}.
 */
export type Lambda = (text?: string, render?: LambdaRenderer) => unknown;

export interface RenderOptions {
  escapeHtml?: boolean;
  onMissingKey?: OnMissingKey;
  keepUnresolved?: boolean;
  delimiters?: readonly [string, string];
  maxDepth?: number;
  enableCache?: boolean;
  partials?: PartialSource | Record<string, string>;
  logger?: Logger;
}

export interface ResolvedRenderOptions {
  readonly escapeHtml: boolean;
  readonly onMissingKey: OnMissingKey;
  readonly keepUnresolved: boolean;
  readonly delimiters: Delimiters;
  readonly maxDepth: number;
  readonly enableCache: boolean;
  readonly partials: PartialSource;
  readonly logger: Logger;
}

export interface CompiledTemplate {
  (data?: unknown): string;
}
