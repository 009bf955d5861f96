export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class TemplateSyntaxError extends TemplateError {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${reason} at line ${line}, column ${column}`);
    this.name = 'TemplateSyntaxError';
  }
}

export interface ResolutionSite {
  line: number;
  column: number;
  template: string;
}

export class MissingKeyError extends TemplateError {
  public readonly line: number;
  public readonly column: number;
  public readonly template: string;

  constructor(public readonly key: string, site: ResolutionSite) {
    super(`Could not find key '${key}' (${site.template}, line ${site.line}, column ${site.column})`);
    this.name = 'MissingKeyError';
    this.line = site.line;
    this.column = site.column;
    this.template = site.template;
  }
}

export class MissingPartialError extends TemplateError {
  public readonly line: number;
  public readonly column: number;
  public readonly template: string;

  constructor(public readonly partial: string, site: ResolutionSite) {
    super(`Could not find partial '${partial}' (${site.template}, line ${site.line}, column ${site.column})`);
    this.name = 'MissingPartialError';
    this.line = site.line;
    this.column = site.column;
    this.template = site.template;
  }
}

export class RecursionLimitExceeded extends TemplateError {
  constructor(
    public readonly depth: number,
    public readonly limit: number
  ) {
    super(`Render depth ${depth} exceeds the limit of ${limit}`);
    this.name = 'RecursionLimitExceeded';
  }
}
