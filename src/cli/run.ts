import path from 'node:path';
import { editDocument } from '../editor';
import { archiveFileName, createInvoiceArchive } from '../invoice/archive';
import { loadConfig, parseMarkerList } from '../shared/config';
import { describeError, isPdfToolError } from '../shared/errors';
import { getLogger } from '../shared/logger';
import type { Logger } from '../shared/logger';
import { getBaseName } from '../shared/file/utils';
import { splitByPageCount, splitDocument } from '../splitter';

export const USAGE = `Usage:
  pdf-invoice-toolkit split <input.pdf> [--out <dir>] [--markers "A|B"] [--pattern <regex>]
                            [--require-multiple] [--pages <n>] [--zip]
  pdf-invoice-toolkit edit <input.pdf> --replace <old>=<new> [--replace ...] [--out <file.pdf>]`;

export type CliCommand =
  | {
    command: 'split';
    input: string;
    outputDirectory: string | null;
    markers: string[] | null;
    pattern: string | null;
    requireMultipleInvoices: boolean;
    pagesPerFile: number | null;
    zip: boolean;
  }
  | {
    command: 'edit';
    input: string;
    outputPath: string | null;
    replacements: Map<string, string>;
  }
  | { command: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface ParsedFlags {
  positionals: string[];
  values: Map<string, string[]>;
  switches: Set<string>;
}

const VALUE_FLAGS = new Set(['--out', '--markers', '--pattern', '--pages', '--replace']);
const SWITCH_FLAGS = new Set(['--require-multiple', '--zip', '--help']);

function parseFlags(args: readonly string[]): ParsedFlags {
  const parsed: ParsedFlags = { positionals: [], values: new Map(), switches: new Set() };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? '';
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const equals = arg.indexOf('=');
    const flag = equals < 0 ? arg : arg.slice(0, equals);
    if (SWITCH_FLAGS.has(flag)) {
      parsed.switches.add(flag);
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new CliUsageError(`Unknown option: ${flag}`);
    }

    let value: string | undefined;
    if (equals >= 0) {
      value = arg.slice(equals + 1);
    } else {
      index += 1;
      value = args[index];
    }
    if (value === undefined) {
      throw new CliUsageError(`Option ${flag} needs a value.`);
    }
    parsed.values.set(flag, [...(parsed.values.get(flag) ?? []), value]);
  }

  return parsed;
}

function lastValue(flags: ParsedFlags, flag: string): string | null {
  const values = flags.values.get(flag);
  return values?.[values.length - 1] ?? null;
}

function parseReplacement(value: string): [string, string] {
  const equals = value.indexOf('=');
  if (equals <= 0) {
    throw new CliUsageError(`Replacement must look like old=new: ${value}`);
  }
  return [value.slice(0, equals), value.slice(equals + 1)];
}

export function parseCliArguments(args: readonly string[]): CliCommand {
  const [command, ...rest] = args;
  if (command === undefined || command === 'help' || command === '--help') {
    return { command: 'help' };
  }

  const flags = parseFlags(rest);
  if (flags.switches.has('--help')) {
    return { command: 'help' };
  }

  const [input, ...extra] = flags.positionals;
  if (input === undefined) {
    throw new CliUsageError(`Missing input PDF for "${command}".`);
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  if (command === 'split') {
    const markers = lastValue(flags, '--markers');
    const pages = lastValue(flags, '--pages');
    const pagesPerFile = pages === null ? null : Number(pages);
    if (pagesPerFile !== null && (!Number.isInteger(pagesPerFile) || pagesPerFile < 1)) {
      throw new CliUsageError(`--pages must be a positive integer, got ${pages}.`);
    }

    return {
      command: 'split',
      input,
      outputDirectory: lastValue(flags, '--out'),
      // An explicit but blank list is passed on so the boundary rule rejects it.
      markers: markers === null ? null : parseMarkerList(markers) ?? [],
      pattern: lastValue(flags, '--pattern'),
      requireMultipleInvoices: flags.switches.has('--require-multiple'),
      pagesPerFile,
      zip: flags.switches.has('--zip')
    };
  }

  if (command === 'edit') {
    const replacements = new Map((flags.values.get('--replace') ?? []).map(parseReplacement));
    if (replacements.size === 0) {
      throw new CliUsageError('edit needs at least one --replace old=new.');
    }
    return { command: 'edit', input, outputPath: lastValue(flags, '--out'), replacements };
  }

  throw new CliUsageError(`Unknown command: ${command}`);
}

export interface CliIo {
  stdout: (line: string) => void;
  logger?: Logger;
}

const defaultIo: CliIo = {
  stdout: (line) => console.log(line)
};

/** Runs one command and returns the process exit code. */
export async function runCli(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = defaultIo
): Promise<number> {
  const config = loadConfig(env);
  const logger = io.logger ?? getLogger('cli', { level: config.logLevel, format: config.logFormat });

  let command: CliCommand;
  try {
    command = parseCliArguments(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      io.stdout(USAGE);
      return 2;
    }
    throw error;
  }

  try {
    switch (command.command) {
      case 'help':
        io.stdout(USAGE);
        return 0;
      case 'split': {
        const outputDirectory = command.outputDirectory ?? config.outputDirectory;
        const files = command.pagesPerFile === null
          ? await splitDocument(command.input, outputDirectory, {
            markers: command.markers ?? config.invoiceMarkers,
            pattern: command.pattern ?? config.invoicePattern,
            requireMultipleInvoices: command.requireMultipleInvoices,
            logger: logger.child({ command: 'split' })
          })
          : await splitByPageCount(command.input, outputDirectory, command.pagesPerFile, {
            logger: logger.child({ command: 'split' })
          });

        for (const file of files) {
          io.stdout(file);
        }
        if (command.zip) {
          const archivePath = path.join(outputDirectory, archiveFileName(getBaseName(command.input)));
          io.stdout(await createInvoiceArchive(files, archivePath));
        }
        return 0;
      }
      case 'edit': {
        const outputPath = await editDocument(command.input, command.replacements, {
          outputPath: command.outputPath ?? undefined,
          logger: logger.child({ command: 'edit' })
        });
        io.stdout(outputPath);
        return 0;
      }
    }
  } catch (error) {
    if (isPdfToolError(error)) {
      logger.error(error.message, { code: error.code, ...error.context });
      return 1;
    }
    logger.error('Unexpected failure', { reason: describeError(error) });
    return 1;
  }
}
