import * as fs from 'fs';
import * as path from 'path';
import { PartialSource } from '../shared/types';

export class MapPartialSource implements PartialSource {
  private partials: Map<string, string>;

  constructor(partials: Record<string, string> | Map<string, string> = {}) {
    this.partials = partials instanceof Map ? new Map(partials) : new Map(Object.entries(partials));
  }

  get(name: string): string | undefined {
    return this.partials.get(name);
  }

  set(name: string, template: string): void {
    this.partials.set(name, template);
  }
}

export interface FilePartialSourceOptions {
  directory: string;
  extension?: string;
  /** Consulted before the file system */
  fallback?: PartialSource;
}

/**
 * Reads `<directory>/<name>.<extension>`. Names resolving outside the
 * directory are treated as missing.
 */
export class FilePartialSource implements PartialSource {
  private directory: string;
  private extension: string;
  private fallback?: PartialSource;
  private cache = new Map<string, string | undefined>();

  constructor(options: FilePartialSourceOptions) {
    this.directory = path.resolve(options.directory);
    this.extension = options.extension ?? 'mustache';
    this.fallback = options.fallback;
  }

  get(name: string): string | undefined {
    const fromFallback = this.fallback?.get(name);
    if (fromFallback !== undefined) {
      return fromFallback;
    }

    if (this.cache.has(name)) {
      return this.cache.get(name);
    }

    const filePath = this.resolve(name);
    const content = filePath ? this.read(filePath) : undefined;
    this.cache.set(name, content);
    return content;
  }

  resolve(name: string): string | null {
    if (!name || name.includes('\0') || path.isAbsolute(name)) {
      return null;
    }

    const fileName = this.extension ? `${name}.${this.extension}` : name;
    const resolved = path.resolve(this.directory, fileName);
    const relative = path.relative(this.directory, resolved);

    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }
    return resolved;
  }

  private read(filePath: string): string | undefined {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch {
      return undefined;
    }
  }
}

export class ChainedPartialSource implements PartialSource {
  private sources: PartialSource[];

  constructor(...sources: PartialSource[]) {
    this.sources = sources;
  }

  get(name: string): string | undefined {
    for (const source of this.sources) {
      const template = source.get(name);
      if (template !== undefined) {
        return template;
      }
    }
    return undefined;
  }
}

export function toPartialSource(partials: PartialSource | Record<string, string> | undefined): PartialSource {
  if (!partials) {
    return new MapPartialSource();
  }
  if (isPartialSource(partials)) {
    return partials;
  }
  return new MapPartialSource(partials);
}

function isPartialSource(value: PartialSource | Record<string, string>): value is PartialSource {
  return typeof value.get === 'function';
}
