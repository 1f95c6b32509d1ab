import type { MatchRule } from '../types/index.js';

/**
 * Raised when a cassette document does not have the expected shape.
 * `path` points at the offending field, e.g. `http_interactions[0].request.uri`.
 */
export class SchemaError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`${path || '<root>'}: ${detail}`);
    this.name = 'SchemaError';
    this.path = path;
  }
}

/**
 * Raised by the body matcher for a rule that cannot be evaluated, such as a
 * regex that does not compile. A body that simply does not match is `false`.
 */
export class MatchError extends Error {
  readonly rule?: MatchRule;

  constructor(message: string, options: { rule?: MatchRule; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'MatchError';
    this.rule = options.rule;
  }
}
