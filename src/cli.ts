#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { batchToRows } from './batch/BatchNormalizer.js';
import { loadConfig } from './config/loader.js';
import { ProtocolGenerator } from './generation/ProtocolGenerator.js';
import { startServer } from './server.js';

export type Command = 'generate' | 'inspect' | 'serve';

export type ParsedArgs = {
  command: Command;
  csvPath?: string;
  protocolPath?: string;
  templatePath?: string;
  outputDir?: string;
  iteration?: number;
  configPath?: string;
  port?: number;
  host?: string;
};

const COMMANDS: readonly Command[] = ['generate', 'inspect', 'serve'];

function getVersion(): string {
  const packageJsonPath = resolve(fileURLToPath(import.meta.url), '../../package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

export function parseIterationArg(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid iteration: ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function parsePortArg(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export function parseArgs(args: string[]): ParsedArgs {
  const [commandArg, ...rest] = args;
  const command = COMMANDS.find((c) => c === commandArg);
  if (command === undefined) {
    throw new Error(`Unknown command: ${commandArg ?? '(none)'}`);
  }

  const parsed: ParsedArgs = { command };
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i] ?? '';
    if (arg === '--csv') {
      parsed.csvPath = requireValue(rest, i, arg);
    } else if (arg === '--protocol') {
      parsed.protocolPath = requireValue(rest, i, arg);
    } else if (arg === '--template') {
      parsed.templatePath = requireValue(rest, i, arg);
    } else if (arg === '--output') {
      parsed.outputDir = requireValue(rest, i, arg);
    } else if (arg === '--iteration') {
      parsed.iteration = parseIterationArg(requireValue(rest, i, arg));
    } else if (arg === '--config') {
      parsed.configPath = requireValue(rest, i, arg);
    } else if (arg === '--port') {
      parsed.port = parsePortArg(requireValue(rest, i, arg));
    } else if (arg === '--host') {
      parsed.host = requireValue(rest, i, arg);
    } else {
      throw new Error(`Unknown arg: ${arg}`);
    }
    i += 1;
  }

  if (command === 'generate' && !parsed.csvPath) {
    throw new Error('--csv is required');
  }
  if (command === 'inspect' && !parsed.protocolPath) {
    throw new Error('--protocol is required');
  }
  return parsed;
}

function printUsage(): void {
  process.stdout.write(
    [
      'Usage: bo-protocol <command> [options]',
      '',
      'Commands:',
      '  generate    Write the protocol for one iteration from a CSV batch',
      '  inspect     Print the batch embedded in a generated protocol',
      '  serve       Start the HTTP API',
      '',
      'Options:',
      '  -h, --help      Show this help message',
      '  -V, --version   Show version number',
      '',
      'generate options:',
      '  --csv <path>          Batch table with colorA,colorB,colorC,DispensePos (required)',
      '  --template <path>     Base protocol template',
      '  --output <dir>        Output directory (default: template directory)',
      '  --iteration <n>       Iteration number (default: from the CSV file name)',
      '  --config <path>       Config file (default: ./config.yaml)',
      '',
      'inspect options:',
      '  --protocol <path>     Generated protocol file (required)',
      '',
      'serve options:',
      '  --port <n>            Port to listen on',
      '  --host <host>         Host to bind to',
      '',
      'Examples:',
      '  bo-protocol generate --csv ./data/BO_R1.csv --template ./color_mixing.py',
      '  bo-protocol inspect --protocol ./color_mixing_1.py',
    ].join('\n') + '\n',
  );
}

export async function runCommand(parsed: ParsedArgs): Promise<unknown> {
  if (parsed.command === 'serve') {
    await startServer({
      ...(parsed.configPath !== undefined ? { configPath: parsed.configPath } : {}),
      ...(parsed.port !== undefined ? { port: parsed.port } : {}),
      ...(parsed.host !== undefined ? { host: parsed.host } : {}),
    });
    return undefined;
  }

  const config = await loadConfig(parsed.configPath !== undefined ? { configPath: parsed.configPath } : {});
  const generator = new ProtocolGenerator(config.generator, {
    info: (message) => process.stderr.write(`${message}\n`),
    warn: (message) => process.stderr.write(`warning: ${message}\n`),
  });

  if (parsed.command === 'inspect') {
    const batch = await generator.inspect(parsed.protocolPath ?? '');
    return { experiments: batch.colorA.length, rows: batchToRows(batch) };
  }

  return generator.generateFromCsv(parsed.csvPath ?? '', {
    ...(parsed.iteration !== undefined ? { iteration: parsed.iteration } : {}),
    ...(parsed.templatePath !== undefined ? { templatePath: parsed.templatePath } : {}),
    ...(parsed.outputDir !== undefined ? { outputDir: parsed.outputDir } : {}),
  });
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  if (args.includes('--version') || args.includes('-V')) {
    process.stdout.write(`${getVersion()}\n`);
    process.exit(0);
  }

  if (args.length === 0) {
    printUsage();
    process.exit(1);
  }

  const result = await runCommand(parseArgs(args));
  if (result !== undefined) {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  }
}

function isCliEntryPoint(): boolean {
  const argvPath = process.argv[1];
  if (!argvPath) {
    return false;
  }
  return resolve(argvPath) === resolve(fileURLToPath(import.meta.url));
}

if (isCliEntryPoint()) {
  void main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
}
