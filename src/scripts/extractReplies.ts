#!/usr/bin/env node
/**
 * Extract Replies Script
 *
 * Splits each message file into replies and prints sender, recipients,
 * timestamp, subject and detected signature for every reply with a sender.
 *
 * Usage:
 *   npm run extract -- thread.txt
 *   npm run extract -- thread.txt other.txt --charset=windows-1252
 *   npm run extract -- thread.txt --length-divisor=3
 *   npm run extract -- thread.txt --output=replies.json
 */

import fs from 'fs/promises';
import path from 'path';
import { ReplyExtractionPipeline, ReplyReport } from '../services/ReplyExtractionPipeline';
import { isDomainError, wrapError } from '../errors/DomainError';
import logger from '../utils/logger';

export interface CliOptions {
  files: string[];
  charset?: string;
  lengthDivisor?: number;
  output?: string;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE =
  'Usage: extract-replies <file...> [--charset=<name>] [--length-divisor=<n>] [--output=<file>]';

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const charsetArg = args.find((a) => a.startsWith('--charset='));
  const divisorArg = args.find((a) => a.startsWith('--length-divisor='));
  const outputArg = args.find((a) => a.startsWith('--output='));

  return {
    files: args.filter((a) => !a.startsWith('--')).map((f) => path.resolve(f)),
    charset: charsetArg ? charsetArg.replace('--charset=', '') : undefined,
    lengthDivisor: divisorArg ? Number(divisorArg.replace('--length-divisor=', '')) : undefined,
    output: outputArg ? path.resolve(outputArg.replace('--output=', '')) : undefined,
  };
}

/**
 * Run the extraction and write the report; resolves to the process exit code
 */
export async function run(args: string[]): Promise<number> {
  const options = parseArgs(args);

  if (options.files.length === 0) {
    logger.error(USAGE);
    return EXIT_USAGE;
  }

  let pipeline: ReplyExtractionPipeline;
  try {
    pipeline = new ReplyExtractionPipeline({
      signature: { length_divisor: options.lengthDivisor },
      decoding: { charset: options.charset },
    });
  } catch (error) {
    const domainError = wrapError(error);
    logger.error(domainError.toUserMessage());
    return EXIT_FAILURE;
  }

  const { results, failures } = await pipeline.extractBatch(options.files);

  const report: Record<string, ReplyReport[]> = {};
  for (const result of results) {
    report[result.source] = pipeline.toReport(result);
  }

  const body = JSON.stringify(options.files.length === 1 ? Object.values(report)[0] ?? [] : report, null, 2);

  if (options.output) {
    await fs.writeFile(options.output, `${body}\n`, 'utf-8');
    logger.info(`Report written to ${options.output}`);
  } else {
    process.stdout.write(`${body}\n`);
  }

  for (const failure of failures) {
    logger.error(`${failure.filePath}: ${failure.error.toUserMessage()}`);
  }

  return failures.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error', {
        error: isDomainError(error) ? error.toJSON() : String(error),
      });
      process.exitCode = EXIT_FAILURE;
    });
}
