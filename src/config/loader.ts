import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  Capabilities,
  CassetteFormat,
  CassetteToolConfig,
  MatchField,
  MatchingConfig,
} from '../types/index.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from './defaults.js';

const MATCH_FIELDS: readonly MatchField[] = ['method', 'uri', 'body', 'headers'];
const FORMATS: readonly CassetteFormat[] = ['json', 'yaml'];
const CAPABILITY_NAMES: readonly (keyof Capabilities)[] = ['json', 'matching', 'regex'];

/**
 * Configuration file structure (YAML format)
 */
export interface ConfigFile {
  capabilities?: {
    json?: boolean;
    matching?: boolean;
    regex?: boolean;
  };
  matching?: {
    matchOn?: string[];
    ignoreHeaders?: string[];
  };
  format?: string;
}

/**
 * CLI options that can override config file
 */
export interface CliOptions {
  config?: string;
  /** Comma-separated capability names, or `none` */
  capabilities?: string;
  /** Comma-separated match fields */
  matchOn?: string;
  format?: string;
}

/**
 * Find config file in current directory or parent directories
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) return null;
    currentDir = parent;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check the parsed YAML against the ConfigFile shape
 */
function toConfigFile(parsed: unknown): ConfigFile {
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error('expected a mapping at the top level');
  }

  const file: ConfigFile = {};

  if (parsed.capabilities !== undefined) {
    const capabilities = parsed.capabilities;
    if (!isRecord(capabilities)) {
      throw new Error('capabilities must be a mapping');
    }
    const flags: Partial<Capabilities> = {};
    for (const name of CAPABILITY_NAMES) {
      const value = capabilities[name];
      if (value === undefined) continue;
      if (typeof value !== 'boolean') {
        throw new Error(`capabilities.${name} must be true or false`);
      }
      flags[name] = value;
    }
    file.capabilities = flags;
  }

  if (parsed.matching !== undefined) {
    const matching = parsed.matching;
    if (!isRecord(matching)) {
      throw new Error('matching must be a mapping');
    }
    const section: NonNullable<ConfigFile['matching']> = {};
    if (matching.matchOn !== undefined) {
      if (!isStringList(matching.matchOn)) {
        throw new Error('matching.matchOn must be a list of strings');
      }
      section.matchOn = matching.matchOn;
    }
    if (matching.ignoreHeaders !== undefined) {
      if (!isStringList(matching.ignoreHeaders)) {
        throw new Error('matching.ignoreHeaders must be a list of strings');
      }
      section.ignoreHeaders = matching.ignoreHeaders;
    }
    file.matching = section;
  }

  if (parsed.format !== undefined) {
    if (typeof parsed.format !== 'string') {
      throw new Error('format must be a string');
    }
    file.format = parsed.format;
  }

  return file;
}

/**
 * Load and parse a YAML config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Config file not found: ${filePath}`);
    }
    throw error;
  }

  try {
    return toConfigFile(parseYaml(content));
  } catch (error) {
    throw new Error(`Failed to parse config file: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function parseMatchFields(names: string[]): MatchField[] {
  return names.map((name) => {
    const field = MATCH_FIELDS.find((f) => f === name.trim());
    if (field === undefined) {
      throw new Error(`Unknown match field: ${name}. Must be: ${MATCH_FIELDS.join(', ')}.`);
    }
    return field;
  });
}

export function parseFormat(name: string): CassetteFormat {
  const format = FORMATS.find((f) => f === name);
  if (format === undefined) {
    throw new Error(`Unknown format: ${name}. Must be: json or yaml.`);
  }
  return format;
}

/**
 * Parse a comma-separated capability list such as `json,matching`.
 * Capabilities left out are disabled; `none` disables all of them.
 */
export function parseCapabilityList(list: string): Capabilities {
  const capabilities: Capabilities = { json: false, matching: false, regex: false };
  if (list.trim() === 'none') return capabilities;

  for (const raw of list.split(',')) {
    const name = CAPABILITY_NAMES.find((n) => n === raw.trim());
    if (name === undefined) {
      throw new Error(`Unknown capability: ${raw}. Must be: ${CAPABILITY_NAMES.join(', ')}, or none.`);
    }
    capabilities[name] = true;
  }
  return capabilities;
}

/**
 * Config values from one source. Fields left out keep the value of the
 * source below.
 */
export interface ConfigOverrides {
  capabilities?: Capabilities;
  matching?: Partial<MatchingConfig>;
  format?: CassetteFormat;
}

/**
 * Convert config file structure to config overrides
 */
export function configFileToCassetteConfig(file: ConfigFile): ConfigOverrides {
  const config: ConfigOverrides = {};

  if (file.capabilities !== undefined) {
    config.capabilities = {
      json: file.capabilities.json ?? DEFAULT_CONFIG.capabilities.json,
      matching: file.capabilities.matching ?? DEFAULT_CONFIG.capabilities.matching,
      regex: file.capabilities.regex ?? DEFAULT_CONFIG.capabilities.regex,
    };
  }

  if (file.matching !== undefined) {
    config.matching = {
      matchOn: file.matching.matchOn
        ? parseMatchFields(file.matching.matchOn)
        : DEFAULT_CONFIG.matching.matchOn,
      ignoreHeaders: file.matching.ignoreHeaders ?? DEFAULT_CONFIG.matching.ignoreHeaders,
    };
  }

  if (file.format !== undefined) {
    config.format = parseFormat(file.format);
  }

  return config;
}

/**
 * Convert CLI options to config overrides
 */
function cliOptionsToCassetteConfig(cli: CliOptions): ConfigOverrides {
  const config: ConfigOverrides = {};

  if (cli.capabilities !== undefined) {
    config.capabilities = parseCapabilityList(cli.capabilities);
  }

  if (cli.matchOn !== undefined) {
    config.matching = { matchOn: parseMatchFields(cli.matchOn.split(',')) };
  }

  if (cli.format !== undefined) {
    config.format = parseFormat(cli.format);
  }

  return config;
}

/**
 * Merge config objects (source overrides target)
 */
function mergeConfig(
  target: CassetteToolConfig,
  source: ConfigOverrides
): CassetteToolConfig {
  return {
    capabilities: source.capabilities ?? target.capabilities,
    matching: {
      matchOn: source.matching?.matchOn ?? target.matching.matchOn,
      ignoreHeaders: source.matching?.ignoreHeaders ?? target.matching.ignoreHeaders,
    },
    format: source.format ?? target.format,
  };
}

/**
 * Load configuration from file and CLI options
 * Priority: CLI options > Config file > Defaults
 */
export async function loadConfig(
  cliOptions: CliOptions = {},
  startDir: string = process.cwd()
): Promise<CassetteToolConfig> {
  let fileConfig: ConfigOverrides = {};

  const configPath = cliOptions.config ?? await findConfigFile(startDir);

  if (configPath) {
    try {
      const configFile = await loadConfigFile(configPath);
      fileConfig = configFileToCassetteConfig(configFile);
    } catch (error) {
      // Only an explicitly named config file is fatal
      if (cliOptions.config) {
        throw error;
      }
    }
  }

  const cliConfig = cliOptionsToCassetteConfig(cliOptions);

  // Merge: defaults <- file <- cli
  const merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  return mergeConfig(merged, cliConfig);
}

/**
 * Validate configuration
 */
export function validateConfig(config: CassetteToolConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.capabilities.regex && !config.capabilities.matching) {
    errors.push('The regex capability requires the matching capability.');
  }

  if (config.matching.matchOn.length === 0) {
    errors.push('matchOn must name at least one field.');
  }

  const seen = new Set<MatchField>();
  for (const field of config.matching.matchOn) {
    if (seen.has(field)) {
      errors.push(`Duplicate match field: ${field}`);
    }
    seen.add(field);
  }

  if (!FORMATS.includes(config.format)) {
    errors.push(`Invalid format: ${config.format}. Must be: json or yaml.`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
