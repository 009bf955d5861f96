export { tokenize, LineLocator, isStandaloneSpan, parseDelimiters } from './tokenizer';
export type { Token, TextToken, TagToken, TagKind, SourceSpan } from './tokenizer';
export { parse } from './parser';
export type {
  TemplateNode,
  TextNode,
  VariableNode,
  SectionNode,
  PartialNode,
  CommentNode,
  DelimiterNode
} from './parser';
export { ContextStack } from './context';
export { classify, isFalsy, stringify, escapeHtml, lookupKey, isLambda } from './values';
export type { TemplateValue, Lookup } from './values';
export { Renderer, ROOT_TEMPLATE, indent } from './renderer';
export type { RenderState, ParseFunction } from './renderer';
export { MapPartialSource, FilePartialSource, ChainedPartialSource, toPartialSource } from './partials';
export type { FilePartialSourceOptions } from './partials';
export { TemplateEngine, render, resolveOptions } from './template-engine';
