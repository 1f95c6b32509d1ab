import { extname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { Capabilities, Cassette, CassetteFormat } from '../types/index.js';
import { DEFAULT_CAPABILITIES } from '../config/defaults.js';
import { decodeCassette } from './decoder.js';
import { encodeCassette } from './encoder.js';
import { SchemaError } from './errors.js';

export interface ParseOptions {
  format: CassetteFormat;
  capabilities?: Capabilities;
}

/**
 * Pick a format from a file name. Unknown extensions fall back to YAML.
 */
export function detectFormat(fileName: string): CassetteFormat {
  const ext = extname(fileName).toLowerCase();
  return ext === '.json' ? 'json' : 'yaml';
}

export function parseCassette(text: string, options: ParseOptions): Cassette {
  let document: unknown;
  try {
    document = options.format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const label = options.format === 'json' ? 'JSON' : 'YAML';
    throw new SchemaError('', `invalid ${label}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return decodeCassette(document, options.capabilities ?? DEFAULT_CAPABILITIES);
}

export function stringifyCassette(cassette: Cassette, format: CassetteFormat): string {
  const document = encodeCassette(cassette);
  if (format === 'json') {
    return `${JSON.stringify(document, null, 2)}\n`;
  }
  return stringifyYaml(document);
}
