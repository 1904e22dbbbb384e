#!/usr/bin/env node
/**
 * mailprobe CLI - verify addresses listed in a text file
 *
 * Usage:
 *   mailprobe-verify <file> [options]
 *
 * Options:
 *   --out <file>          Write full JSON results to file
 *   --concurrency <n>     Addresses verified in parallel (default 5)
 *   --help, -h            Show help
 */

import * as fs from 'fs';
import * as path from 'path';
import { validateConfig } from '../config/env';
import { createDefaultDependencies, DEFAULT_BATCH_CONCURRENCY, verifyEmailBatch } from '../services/emailVerificationService';
import { VerificationResult, Verdict } from '../types/email';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_CONCURRENCY = DEFAULT_BATCH_CONCURRENCY;
const MAX_CONCURRENCY = 50;

export interface CliOptions {
  inputFile: string;
  outputFile?: string;
  concurrency: number;
  showHelp: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    inputFile: '',
    concurrency: DEFAULT_CONCURRENCY,
    showHelp: args.length === 0 || args.includes('--help') || args.includes('-h'),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--out' || arg === '--concurrency') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`Missing value for ${arg}`);
      }
      i++;

      if (arg === '--out') {
        options.outputFile = value;
      } else {
        const concurrency = Number(value);
        if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
          throw new CliUsageError(`--concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
        }
        options.concurrency = concurrency;
      }
    } else if (arg === '--help' || arg === '-h') {
      continue;
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else if (!options.inputFile) {
      options.inputFile = arg;
    }
  }

  return options;
}

/**
 * Non-empty lines that are not `#` comments
 */
export function parseEmailList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function showHelp(): void {
  console.log(`
mailprobe - email deliverability verification

USAGE
  mailprobe-verify <file> [options]

ARGUMENTS
  <file>                  Text file with one address per line (# starts a comment)

OPTIONS
  --out <file>            Write full JSON results to the given file
  --concurrency <n>       Addresses verified in parallel (1-${MAX_CONCURRENCY}, default ${DEFAULT_CONCURRENCY})
  --help, -h              Show this help message

Proxies, per-provider methods and timeouts are read from the environment (.env).
`);
}

function pad(value: string, width: number): string {
  return value.length > width ? `${value.substring(0, width - 3)}...` : value.padEnd(width);
}

/**
 * Summary table, one row per address
 */
export function formatResultsTable(results: VerificationResult[]): string {
  const lines: string[] = [];
  lines.push([pad('Email', 32), pad('Verdict', 8), 'Reason'].join(' | '));
  lines.push('-'.repeat(100));

  for (const result of results) {
    lines.push([pad(result.input, 32), pad(result.verdict, 8), result.reason].join(' | '));
  }

  const counts = Object.values(Verdict).map(
    (verdict) => `${verdict}: ${results.filter((result) => result.verdict === verdict).length}`
  );
  lines.push('-'.repeat(100));
  lines.push(`Total: ${results.length} (${counts.join(', ')})`);

  return lines.join('\n');
}

/**
 * Main CLI function
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error('Run with --help for usage information');
    return 1;
  }

  if (options.showHelp) {
    showHelp();
    return 0;
  }

  if (!options.inputFile) {
    console.error('Error: Missing required argument: <file>');
    return 1;
  }

  const absoluteInput = path.resolve(options.inputFile);
  if (!fs.existsSync(absoluteInput)) {
    console.error(`Error: File not found: ${options.inputFile}`);
    return 1;
  }

  const emails = parseEmailList(fs.readFileSync(absoluteInput, 'utf-8'));
  if (emails.length === 0) {
    console.error(`Error: No emails found in file: ${options.inputFile}`);
    return 1;
  }

  validateConfig();
  const deps = createDefaultDependencies();

  console.log(`Verifying ${emails.length} address(es) with concurrency ${options.concurrency}`);
  const startTime = Date.now();
  const results = await verifyEmailBatch(emails, deps, options.concurrency);
  const duration = Date.now() - startTime;

  console.log(formatResultsTable(results));
  console.log(`\nCompleted in ${(duration / 1000).toFixed(2)}s`);

  if (options.outputFile) {
    const absoluteOutput = path.resolve(options.outputFile);
    fs.writeFileSync(absoluteOutput, JSON.stringify(results, null, 2), 'utf-8');
    console.log(`Full results written to: ${absoluteOutput}`);
  }

  return 0;
}

// Run CLI
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('CLI fatal error', error);
      process.exitCode = 1;
    });
}
