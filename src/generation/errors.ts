/**
 * Error taxonomy for protocol generation.
 *
 * Every error carries a machine-readable code and the HTTP status the API
 * layer answers with.
 */

export class GenerationError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = 'GenerationError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * The batch table could not be located or parsed.
 */
export class SourceReadError extends GenerationError {
  constructor(message: string) {
    super('SOURCE_READ', message, 400);
    this.name = 'SourceReadError';
  }
}

/**
 * The batch table lacks a required column or holds a value of the wrong type.
 */
export class SchemaError extends GenerationError {
  readonly column: string;

  constructor(column: string, message: string) {
    super('SCHEMA', message, 400);
    this.name = 'SchemaError';
    this.column = column;
  }
}

/**
 * The base template could not be read.
 */
export class TemplateReadError extends GenerationError {
  readonly templatePath: string;

  constructor(templatePath: string, message: string) {
    super('TEMPLATE_READ', message, 404);
    this.name = 'TemplateReadError';
    this.templatePath = templatePath;
  }
}

export type TemplateMalformedCode =
  | 'REGION_NOT_FOUND'
  | 'REGION_MALFORMED'
  | 'UNBALANCED_BRACES'
  | 'AMBIGUOUS_REGION'
  | 'LITERAL_SYNTAX';

/**
 * The template's mutable data region is missing, ambiguous or unbalanced.
 */
export class TemplateMalformedError extends GenerationError {
  /** 1-based line where the problem was detected, when known */
  readonly line: number | undefined;

  constructor(code: TemplateMalformedCode, message: string, line?: number) {
    super(code, line !== undefined ? `${message} (line ${line})` : message, 422);
    this.name = 'TemplateMalformedError';
    this.line = line;
  }
}
