import type { Capabilities, CassetteToolConfig } from '../types/index.js';

/**
 * Every optional body and matcher variant enabled
 */
export const DEFAULT_CAPABILITIES: Capabilities = {
  json: true,
  matching: true,
  regex: true,
};

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: CassetteToolConfig = {
  capabilities: DEFAULT_CAPABILITIES,
  matching: {
    matchOn: ['method', 'uri', 'body'],
    ignoreHeaders: [
      'authorization',
      'cookie',
      'x-request-id',
      'x-correlation-id',
      'date',
      'user-agent',
      'host',
      'content-length',
      'connection',
      'accept-encoding',
    ],
  },
  format: 'yaml',
};

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'vcr-cassette.config.yml',
  'vcr-cassette.config.yaml',
  '.vcrcassetterc.yml',
  '.vcrcassetterc.yaml',
];
