#!/usr/bin/env node

import { readFile, writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { Cassette, CassetteFormat, CassetteToolConfig } from '../types/index.js';
import { loadConfig, validateConfig, parseFormat, type CliOptions } from '../config/index.js';
import { detectFormat, parseCassette, stringifyCassette } from '../core/format.js';
import { InteractionMatcher } from '../core/matcher.js';
import { bodyToString } from '../core/model.js';
import { SchemaError } from '../core/errors.js';

const program = new Command();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logInfo(label: string, value: string): void {
  console.log(`  ${colors.dim}${label}:${colors.reset} ${colors.cyan}${value}${colors.reset}`);
}

function fail(error: unknown, file?: string): never {
  if (error instanceof SchemaError) {
    log(`Invalid cassette${file ? ` ${file}` : ''}`, 'red');
    logInfo('Field', error.path || '<root>');
    log(`  ${error.message}`, 'red');
  } else if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    log(`Error: File not found: ${'path' in error ? String(error.path) : file}`, 'red');
  } else {
    log(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`, 'red');
  }
  process.exit(1);
}

interface CommonOptions {
  config?: string;
  capabilities?: string;
  matchOn?: string;
}

async function resolveConfig(options: CommonOptions): Promise<CassetteToolConfig> {
  const cliOptions: CliOptions = {
    config: options.config,
    capabilities: options.capabilities,
    matchOn: options.matchOn,
  };
  const config = await loadConfig(cliOptions);

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new Error(validation.errors.join(' '));
  }
  return config;
}

async function readCassette(file: string, config: CassetteToolConfig): Promise<Cassette> {
  const text = await readFile(file, 'utf-8');
  return parseCassette(text, { format: detectFormat(file), capabilities: config.capabilities });
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file path')
    .option('--capabilities <list>', 'Enabled capabilities (json,matching,regex or none)')
    .option('--match-on <list>', 'Request fields to match on (method,uri,body,headers)');
}

program
  .name('vcr-cassette')
  .description('Inspect, validate and query VCR cassette recordings')
  .version('1.0.0');

// ============================================================================
// VALIDATE COMMAND
// ============================================================================
withCommonOptions(
  program
    .command('validate <file>')
    .description('Check that a cassette file is well formed')
).action(async (file: string, options: CommonOptions) => {
  try {
    const config = await resolveConfig(options);
    const cassette = await readCassette(file, config);

    log(`Valid cassette ${file}`, 'green');
    logInfo('Recorded with', cassette.recorded_with);
    logInfo('Interactions', String(cassette.http_interactions.length));
  } catch (error) {
    fail(error, file);
  }
});

// ============================================================================
// LIST COMMAND
// ============================================================================
interface ListOptions extends CommonOptions {
  json?: boolean;
}

withCommonOptions(
  program
    .command('list <file>')
    .description('List recorded interactions')
    .option('--json', 'Output as JSON')
).action(async (file: string, options: ListOptions) => {
  try {
    const config = await resolveConfig(options);
    const cassette = await readCassette(file, config);

    if (options.json) {
      console.log(stringifyCassette(cassette, 'json'));
      return;
    }

    console.log('');
    log('  Recorded Interactions', 'bright');
    console.log('');

    if (cassette.http_interactions.length === 0) {
      log('  No interactions recorded.', 'dim');
      console.log('');
      return;
    }

    logInfo('Cassette', file);
    logInfo('Recorded with', cassette.recorded_with);
    logInfo('Count', String(cassette.http_interactions.length));
    console.log('');

    // Table header
    console.log(
      `  ${colors.dim}${'#'.padEnd(5)} ${'METHOD'.padEnd(8)} ${'URI'.padEnd(45)} ${'STATUS'.padEnd(8)} RECORDED${colors.reset}`
    );
    console.log(`  ${colors.dim}${'-'.repeat(100)}${colors.reset}`);

    // Table rows
    cassette.http_interactions.forEach((interaction, index) => {
      const { request, response } = interaction;
      const method = request.method.toUpperCase().padEnd(8);
      const uri = request.uri.length > 43
        ? request.uri.substring(0, 42) + '..'
        : request.uri.padEnd(45);
      const status = String(response.status.code).padEnd(8);
      const statusColor = response.status.code >= 400 ? colors.red : colors.green;

      console.log(
        `  ${colors.dim}${String(index).padEnd(5)}${colors.reset} ${colors.magenta}${method}${colors.reset} ${uri} ${statusColor}${status}${colors.reset} ${colors.dim}${interaction.recorded_at}${colors.reset}`
      );
    });

    console.log('');
  } catch (error) {
    fail(error, file);
  }
});

// ============================================================================
// MATCH COMMAND
// ============================================================================
interface MatchOptions extends CommonOptions {
  method: string;
  uri: string;
  body?: string;
  bodyFile?: string;
  header?: string[];
}

function parseHeaders(raw: string[] = []): Map<string, string[]> {
  const headers = new Map<string, string[]>();
  for (const entry of raw) {
    const separator = entry.indexOf(':');
    if (separator <= 0) {
      throw new Error(`Invalid header "${entry}". Use "Name: value".`);
    }
    const name = entry.substring(0, separator).trim();
    const value = entry.substring(separator + 1).trim();
    headers.set(name, [...(headers.get(name) ?? []), value]);
  }
  return headers;
}

withCommonOptions(
  program
    .command('match <file>')
    .description('Find the recorded interaction that answers a request')
    .requiredOption('-m, --method <method>', 'Request method')
    .requiredOption('-u, --uri <uri>', 'Request URI')
    .option('-b, --body <text>', 'Request body')
    .option('--body-file <path>', 'Read the request body from a file')
    .option('-H, --header <header...>', 'Request header as "Name: value"')
).action(async (file: string, options: MatchOptions) => {
  try {
    const config = await resolveConfig(options);
    const cassette = await readCassette(file, config);
    const body = options.bodyFile !== undefined
      ? await readFile(options.bodyFile, 'utf-8')
      : options.body;

    const matcher = new InteractionMatcher(config.matching, config.capabilities);
    const matches = matcher.findAllMatches(
      { method: options.method, uri: options.uri, body, headers: parseHeaders(options.header) },
      cassette
    );

    if (matches.length === 0) {
      log(`No interaction matches ${options.method.toUpperCase()} ${options.uri}`, 'yellow');
      logInfo('Matched on', config.matching.matchOn.join(', '));
      process.exit(1);
    }

    const [first] = matches;
    const { response } = first.interaction;
    log(`Interaction #${first.index} matches`, 'green');
    logInfo('Matched on', first.matchedBy.join(', '));
    if (matches.length > 1) {
      logInfo('Also matching', matches.slice(1).map((m) => `#${m.index}`).join(', '));
    }
    logInfo('Status', `${response.status.code} ${response.status.message}`);
    console.log('');
    console.log(bodyToString(response.body));
  } catch (error) {
    fail(error, file);
  }
});

// ============================================================================
// CONVERT COMMAND
// ============================================================================
interface ConvertOptions extends CommonOptions {
  to?: string;
  output?: string;
}

withCommonOptions(
  program
    .command('convert <file>')
    .description('Re-encode a cassette as JSON or YAML')
    .option('-t, --to <format>', 'Output format (json|yaml, default from config)')
    .option('-o, --output <path>', 'Output file path (default: stdout)')
).action(async (file: string, options: ConvertOptions) => {
  try {
    const config = await resolveConfig(options);
    const format: CassetteFormat = options.to !== undefined ? parseFormat(options.to) : config.format;
    const cassette = await readCassette(file, config);
    const text = stringifyCassette(cassette, format);

    if (options.output === undefined) {
      process.stdout.write(text);
      return;
    }

    await writeFile(options.output, text);
    log(`Converted ${cassette.http_interactions.length} interaction(s) to ${options.output}`, 'green');
  } catch (error) {
    fail(error, file);
  }
});

program.parse();
