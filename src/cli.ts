#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './config/loader.js';
import type { ExtractionService } from './extraction/service.js';
import type { ExtractionResult } from './extraction/views.js';
import { setupLogging } from './logging-config.js';
import { createExtractionService } from './service-factory.js';

export interface ParsedCliArgs {
  url: string | null;
  file: string | null;
  domain: string | null;
  schemaVersion: string | null;
  apiKey: string | null;
  debug: boolean;
  listDomains: boolean;
  help: boolean;
}

const VALUE_FLAGS = {
  '--domain': 'domain',
  '-d': 'domain',
  '--schema-version': 'schemaVersion',
  '--api-key': 'apiKey',
  '--file': 'file',
  '-f': 'file',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const isValueFlag = (flag: string): flag is ValueFlag =>
  Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);

export const getCliUsage = () =>
  [
    'Usage: structura <url> --domain <domain> [options]',
    '       structura --file <path> --domain <domain> [options]',
    '       structura --list-domains',
    '',
    'Options:',
    '  -d, --domain <name>         Blueprint domain, e.g. e-commerce',
    '      --schema-version <v>    Blueprint version (default: v1)',
    '      --api-key <key>         API key for protected blueprints (or STRUCTURA_API_KEY)',
    '  -f, --file <path>           Extract from a local .md, .txt or .html file',
    '      --list-domains          Print the open blueprint domains',
    '      --debug                 Verbose logging',
    '  -h, --help                  Show this help',
  ].join('\n');

export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const parsed: ParsedCliArgs = {
    url: null,
    file: null,
    domain: null,
    schemaVersion: null,
    apiKey: null,
    debug: false,
    listDomains: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (flag === '--help' || flag === '-h') {
      parsed.help = true;
    } else if (flag === '--debug') {
      parsed.debug = true;
    } else if (flag === '--list-domains') {
      parsed.listDomains = true;
    } else if (isValueFlag(flag)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '') {
        throw new Error(`Missing value for ${flag}`);
      }
      parsed[VALUE_FLAGS[flag]] = value;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (parsed.url === null) {
      parsed.url = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const printResult = (result: ExtractionResult, io: CliIo) => {
  if (result.success) {
    io.stdout(JSON.stringify(result.data, null, 2));
    return 0;
  }
  io.stderr(`${result.kind}: ${result.message}`);
  for (const violation of result.violations ?? []) {
    io.stderr(`  - ${violation.path || '(root)'} [${violation.rule}] ${violation.message}`);
  }
  return 1;
};

/**
 * Run one CLI invocation against `service` and return the exit code.
 */
export async function runCli(
  args: ParsedCliArgs,
  service: ExtractionService,
  io: CliIo = defaultIo,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  if (args.listDomains) {
    io.stdout(service.listOpenDomains().join('\n'));
    return 0;
  }
  if (!args.domain || (!args.url && !args.file) || (args.url && args.file)) {
    io.stderr(getCliUsage());
    return 2;
  }

  const target = {
    domain: args.domain,
    schemaVersion: args.schemaVersion ?? undefined,
    apiKey: args.apiKey ?? env.STRUCTURA_API_KEY ?? undefined,
  };

  if (args.file) {
    const content = await fs.readFile(args.file);
    return printResult(
      await service.extractFromFile({ ...target, filename: path.basename(args.file), content }),
      io
    );
  }
  return printResult(await service.extract({ ...target, url: args.url ?? '' }), io);
}

async function main() {
  let args: ParsedCliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(getCliUsage());
    process.exit(2);
  }
  if (args.help) {
    console.log(getCliUsage());
    return;
  }

  const config = await loadConfig();
  setupLogging({ logLevel: args.debug ? 'debug' : config.logging.level });
  const service = await createExtractionService(config);
  process.exitCode = await runCli(args, service);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Error running extraction:', error);
    process.exit(1);
  });
}
