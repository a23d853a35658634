#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { promises as fsp } from 'fs';
import path from 'path';
import { convertFile, convertFolder } from './convert/convert';
import { describeError } from './errors';
import { ConsoleLogger, LogLevel, parseLogLevel, setLogger, withMinLevel } from './logging/logger';
import type { ConversionStrategy, ConvertProgress, FileConvertOptions } from './options';

export const VERSION = '0.1.0';

interface CliOptions {
  input: string;
  output?: string;
  strategy: ConversionStrategy;
  keepMalformed?: boolean;
  maxDepth?: number;
  warnColumns?: number;
  bom: boolean;
  logLevel: LogLevel;
  progress: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function strategy(value: string): ConversionStrategy {
  if (value === 'cache' || value === 'reparse') return value;
  throw new InvalidArgumentError('Expected "cache" or "reparse".');
}

function logLevel(value: string): LogLevel {
  try {
    return parseLogLevel(value);
  } catch (err) {
    throw new InvalidArgumentError(describeError(err));
  }
}

function progressPrinter(): (p: ConvertProgress) => void {
  return ({ phase, current, total }) => {
    if (!process.stderr.isTTY) return;
    if (phase === 'emit' && total) {
      const filled = Math.round((40 * current) / total);
      process.stderr.write(`\r  [${'#'.repeat(filled)}${'.'.repeat(40 - filled)}] ${current}/${total}`);
      if (current === total) process.stderr.write('\n');
    } else {
      process.stderr.write(`\r  reading... ${current}`);
    }
  };
}

async function run(opts: CliOptions): Promise<void> {
  setLogger(withMinLevel(new ConsoleLogger('evtx-flatten'), opts.logLevel));

  const convertOptions: FileConvertOptions = {
    strategy: opts.strategy,
    malformedRecords: opts.keepMalformed ? 'emit' : 'skip',
    maxUserDataDepth: opts.maxDepth,
    newColumnWarningThreshold: opts.warnColumns,
    bom: opts.bom,
    onProgress: opts.progress ? progressPrinter() : undefined,
  };

  const inputPath = path.resolve(opts.input);
  let isDirectory: boolean;
  try {
    isDirectory = (await fsp.stat(inputPath)).isDirectory();
  } catch {
    console.error(`ERROR: input not found: ${inputPath}`);
    process.exitCode = 1;
    return;
  }

  if (isDirectory) {
    const outDir = opts.output ? path.resolve(opts.output) : inputPath;
    console.log(`Input folder : ${inputPath}`);
    console.log(`Output folder: ${outDir}`);
    const results = await convertFolder(inputPath, outDir, convertOptions);
    const counts = Object.values(results);
    const total = counts.filter(n => n >= 0).reduce((a, b) => a + b, 0);
    const errors = counts.filter(n => n < 0).length;
    console.log(`Summary: ${total} events exported from ${counts.length} file(s), ${errors} error(s).`);
    if (errors) process.exitCode = 1;
    return;
  }

  const outFile = opts.output
    ? path.resolve(opts.output)
    : path.join(path.dirname(inputPath), `${path.parse(inputPath).name}.csv`);
  console.log(`Input file : ${inputPath}`);
  console.log(`Output file: ${outFile}`);
  const result = await convertFile(inputPath, outFile, convertOptions);
  const skipped = result.failures.length ? `, ${result.failures.length} malformed` : '';
  console.log(`${result.rowsWritten} events exported (${result.header.length} columns${skipped}) -> ${outFile}`);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('evtx-flatten')
    .description('Flatten Windows event records from XML exports into CSV with one unified header')
    .version(VERSION)
    .requiredOption('-i, --input <path>', 'XML export file, or a folder of exports')
    .option('-o, --output <path>', 'CSV file, or output folder when the input is a folder')
    .option('--strategy <strategy>', 'cache rows between passes, or reparse the input', strategy, 'cache')
    .option('--keep-malformed', 'emit a row with a ParseError column for unparseable records')
    .option('--max-depth <n>', 'deepest UserData path flattened into UD_* columns', positiveInt)
    .option('--warn-columns <n>', 'warn when one record adds at least this many columns', positiveInt)
    .option('--no-bom', 'do not prefix the CSV with a UTF-8 byte order mark')
    .option('--no-progress', 'do not print a progress bar')
    .option('--log-level <level>', 'trace, debug, info, warn or error', logLevel, 'warn')
    .action(async () => {
      await run(program.opts<CliOptions>());
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`ERROR: ${describeError(err)}`);
      process.exitCode = 1;
    });
}
