export * from './types/index.js';
export { SchemaError, MatchError } from './core/errors.js';
export {
  plainBody,
  encodedBody,
  createBodyBuilder,
  bodyToString,
  recordedAtDate,
  type BodyBuilder,
} from './core/model.js';
export { decodeCassette } from './core/decoder.js';
export {
  encodeCassette,
  encodeBody,
  type CassetteDocument,
  type InteractionDocument,
  type BodyDocument,
  type MatchRuleDocument,
  type HeadersDocument,
} from './core/encoder.js';
export { matchBody, matchRule, jsonEquals } from './core/body-matcher.js';
export { InteractionMatcher, type MatchResult } from './core/matcher.js';
export {
  detectFormat,
  parseCassette,
  stringifyCassette,
  type ParseOptions,
} from './core/format.js';
export * from './config/index.js';
