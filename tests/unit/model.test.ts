import { describe, it, expect } from 'vitest';
import {
  bodyToString,
  createBodyBuilder,
  encodedBody,
  plainBody,
  recordedAtDate,
} from '../../src/core/model.js';
import { SchemaError } from '../../src/core/errors.js';
import type { HttpInteraction } from '../../src/types/index.js';

function createInteraction(recordedAt: string): HttpInteraction {
  return {
    request: { uri: 'http://localhost/', body: plainBody(), method: 'get', headers: new Map() },
    response: {
      body: plainBody('ok'),
      http_version: '1.1',
      status: { code: 200, message: 'OK' },
      headers: new Map(),
    },
    recorded_at: recordedAt,
  };
}

describe('createBodyBuilder', () => {
  it('should build every variant with default capabilities', () => {
    const build = createBodyBuilder();

    expect(build.plain('x')).toEqual({ kind: 'plain', text: 'x' });
    expect(build.encoded('x', 'UTF-8')).toEqual({ kind: 'encoded', encoding: 'UTF-8', text: 'x' });
    expect(build.json({ a: 1 })).toEqual({ kind: 'json', value: { a: 1 } });
    expect(build.matches([build.substring('a'), build.regex('b+')])).toEqual({
      kind: 'matches',
      rules: [
        { kind: 'substring', needle: 'a' },
        { kind: 'regex', pattern: 'b+' },
      ],
    });
  });

  it('should refuse variants whose capability is disabled', () => {
    const build = createBodyBuilder({ json: false, matching: false, regex: false });

    expect(() => build.json(null)).toThrow(SchemaError);
    expect(() => build.matches([])).toThrow(
      '<root>: unsupported body variant "matches" (matching capability disabled)'
    );
    expect(() => build.substring('a')).toThrow(SchemaError);
    expect(() => build.regex('a')).toThrow(
      '<root>: unsupported body variant "regex" (matching capability disabled)'
    );
    expect(build.plain()).toEqual({ kind: 'plain', text: '' });
  });

  it('should refuse regex rules when matching is disabled', () => {
    const build = createBodyBuilder({ json: true, matching: false, regex: true });

    expect(() => build.regex('a+')).toThrow(
      '<root>: unsupported body variant "regex" (matching capability disabled)'
    );
  });

  it('should refuse regex rules when only regex is disabled', () => {
    const build = createBodyBuilder({ json: true, matching: true, regex: false });

    expect(() => build.regex('a+')).toThrow(
      '<root>: unsupported body variant "regex" (regex capability disabled)'
    );
    expect(build.substring('a')).toEqual({ kind: 'substring', needle: 'a' });
  });

  it('should reject json values with non-finite numbers', () => {
    const build = createBodyBuilder();

    expect(() => build.json({ a: Number.NaN })).toThrow(
      'a: number NaN is not representable as JSON'
    );
    expect(() => build.json([1, Number.POSITIVE_INFINITY])).toThrow(
      '[1]: number Infinity is not representable as JSON'
    );
    expect(() => build.json(Number.NEGATIVE_INFINITY)).toThrow(SchemaError);
  });

  it('should copy the json value', () => {
    const build = createBodyBuilder();
    const value = { roles: ['admin'] };
    const body = build.json(value);
    value.roles.push('dev');

    expect(body.value).toEqual({ roles: ['admin'] });
  });

  it('should copy the rule list', () => {
    const build = createBodyBuilder();
    const rules = [build.substring('a')];
    const body = build.matches(rules);
    rules.push(build.substring('b'));

    expect(body.rules).toHaveLength(1);
  });
});

describe('bodyToString', () => {
  it('should render plain and encoded bodies', () => {
    expect(bodyToString(plainBody('Hello foo'))).toBe('Hello foo');
    expect(bodyToString(encodedBody('abc'))).toBe('abc');
    expect(bodyToString(encodedBody('YWJj', 'base64'))).toBe('(base64)YWJj');
  });

  it('should render json compactly', () => {
    expect(bodyToString({ kind: 'json', value: { a: [1, 'b'] } })).toBe('{"a":[1,"b"]}');
  });

  it('should render match rules', () => {
    expect(
      bodyToString({
        kind: 'matches',
        rules: [
          { kind: 'substring', needle: 'foo' },
          { kind: 'regex', pattern: '\\d+' },
        ],
      })
    ).toBe('[substring("foo"), regex("\\\\d+")]');
  });
});

describe('recordedAtDate', () => {
  it('should parse an HTTP date', () => {
    const date = recordedAtDate(createInteraction('Tue, 01 Nov 2011 04:58:44 GMT'));
    expect(date?.toISOString()).toBe('2011-11-01T04:58:44.000Z');
  });

  it('should return null for text that is not a date', () => {
    expect(recordedAtDate(createInteraction('not a date'))).toBeNull();
  });
});
