import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { detectFormat, parseCassette, stringifyCassette } from '../../src/core/format.js';
import { SchemaError } from '../../src/core/errors.js';

async function fixture(name: string): Promise<string> {
  return readFile(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}

describe('detectFormat', () => {
  it('should detect JSON by extension', () => {
    expect(detectFormat('cassettes/example.json')).toBe('json');
    expect(detectFormat('EXAMPLE.JSON')).toBe('json');
  });

  it('should detect YAML by extension', () => {
    expect(detectFormat('example.yml')).toBe('yaml');
    expect(detectFormat('example.yaml')).toBe('yaml');
  });

  it('should fall back to YAML', () => {
    expect(detectFormat('cassette')).toBe('yaml');
  });
});

describe('parseCassette', () => {
  it('should parse a JSON cassette', async () => {
    const cassette = parseCassette(await fixture('example.json'), { format: 'json' });

    expect(cassette.recorded_with).toBe('VCR 2.0.0');
    expect(cassette.http_interactions[0].response.status.code).toBe(200);
  });

  it('should parse a VCR YAML cassette', async () => {
    const cassette = parseCassette(await fixture('example.yml'), { format: 'yaml' });
    const [first, second] = cassette.http_interactions;

    expect(cassette.http_interactions).toHaveLength(2);
    expect(first.request.body).toEqual({ kind: 'encoded', encoding: 'UTF-8', text: '' });
    expect(first.request.headers.get('Accept')).toEqual(['text/html', 'application/json']);
    expect(first.response.body).toEqual({ kind: 'encoded', encoding: 'UTF-8', text: 'Hello foo' });
    expect(first.response.headers.get('Content-Length')).toEqual(['9']);
    expect(first.response.http_version).toBe('1.1');
    expect(first.recorded_at).toBe('Tue, 01 Nov 2011 04:58:44 GMT');
    expect(second.request.body).toEqual({ kind: 'plain', text: 'name=bar' });
    expect(second.request.headers.size).toBe(0);
    expect(second.response.status).toEqual({ code: 201, message: 'Created' });
  });

  it('should parse json and matcher bodies', async () => {
    const cassette = parseCassette(await fixture('matchers.json'), { format: 'json' });

    expect(cassette.http_interactions[0].request.body).toEqual({
      kind: 'json',
      value: { name: 'alice', roles: ['admin', 'dev'] },
    });
    expect(cassette.http_interactions[1].request.body).toEqual({
      kind: 'matches',
      rules: [
        { kind: 'substring', needle: 'query=' },
        { kind: 'regex', pattern: 'page=\\d+' },
      ],
    });
  });

  it('should apply capabilities', async () => {
    const text = await fixture('matchers.json');

    expect(() =>
      parseCassette(text, { format: 'json', capabilities: { json: true, matching: false, regex: false } })
    ).toThrow(
      'http_interactions[1].request.body: unsupported body variant "matches" (matching capability disabled)'
    );
  });

  it('should report invalid JSON as a SchemaError at the root', () => {
    let caught: unknown;
    try {
      parseCassette('{"http_interactions": [', { format: 'json' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    if (caught instanceof SchemaError) {
      expect(caught.path).toBe('');
      expect(caught.message.startsWith('<root>: invalid JSON: ')).toBe(true);
    }
  });

  it('should report invalid YAML as a SchemaError', () => {
    expect(() => parseCassette('http_interactions: [\n', { format: 'yaml' })).toThrow(SchemaError);
  });

  it('should reject an empty YAML document', () => {
    expect(() => parseCassette('', { format: 'yaml' })).toThrow('<root>: expected a mapping');
  });
});

describe('stringifyCassette', () => {
  it('should write indented JSON with a trailing newline', async () => {
    const cassette = parseCassette(await fixture('example.json'), { format: 'json' });
    const text = stringifyCassette(cassette, 'json');

    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[1]).toBe('  "http_interactions": [');
  });

  it('should write the empty plain body as an empty string', async () => {
    const cassette = parseCassette(await fixture('example.json'), { format: 'json' });
    const document: unknown = JSON.parse(stringifyCassette(cassette, 'json'));

    expect(document).toMatchObject({ http_interactions: [{ request: { body: '' } }] });
  });

  it('should convert YAML to JSON and back', async () => {
    const cassette = parseCassette(await fixture('example.yml'), { format: 'yaml' });
    const json = stringifyCassette(cassette, 'json');
    const yaml = stringifyCassette(parseCassette(json, { format: 'json' }), 'yaml');

    expect(parseCassette(yaml, { format: 'yaml' })).toEqual(cassette);
  });

  it('should keep the recorder line in YAML output', async () => {
    const cassette = parseCassette(await fixture('example.json'), { format: 'json' });
    const lines = stringifyCassette(cassette, 'yaml').trimEnd().split('\n');

    expect(lines[lines.length - 1]).toBe('recorded_with: VCR 2.0.0');
  });
});
