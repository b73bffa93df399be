/**
 * doxygen-md - Command-Line Runner
 *
 * Converts stdin, a single file, or every XML file of a directory.
 * Directory runs write one Markdown file per input, grouped by namespace.
 */

import { parseArgs } from 'node:util';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import type { Logger, ResolvedConfig } from '../types';
import { convert } from '../convert';
import { parseXml, readDocument } from '../parsers';
import { renderDocument } from '../renderers';
import { createLogger, getExitCode, isDoxygenMdError, MalformedInputError, resolveConfig } from '../core';
import { groupForDocument, toGroupDirectory } from './grouping';

// CLI Configuration

export const VERSION = '0.1.0';

export const HELP_TEXT = `
doxygen-md - Convert Doxygen XML to Markdown

Usage:
  doxygen-md                       Convert XML read from stdin
  doxygen-md <file.xml>            Convert one file and print the Markdown
  doxygen-md <dir> [options]       Convert every XML file in a directory
  doxygen-md --help                Show this help message
  doxygen-md --version             Show version

Options:
  --outdir, -o <dir>      Output directory for directory input (default: ./doxygen_md_output)
  --pattern, -p <glob>    Files to convert inside the directory (default: *.xml)
  --verbose, -v           Enable verbose logging

Environment:
  DOXYGEN_MD_OUTDIR, DOXYGEN_MD_PATTERN, DOXYGEN_MD_VERBOSE
`;

/**
 * Process streams the runner talks to
 */
export interface CliIO {
  stdout: (text: string) => void;
  readStdin: () => Promise<string>;
  env: NodeJS.ProcessEnv;
  /** Overrides the logger built from the resolved configuration */
  logger?: Logger;
}

export interface DirectoryResult {
  written: string[];
  skipped: string[];
}

// Argument Parsing

interface ParsedArgs {
  help: boolean;
  version: boolean;
  input?: string;
  outDir?: string;
  pattern?: string;
  verbose?: boolean;
}

function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      outdir: { type: 'string', short: 'o' },
      pattern: { type: 'string', short: 'p' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  return {
    help: values.help ?? false,
    version: values.version ?? false,
    input: positionals[0],
    outDir: values.outdir,
    pattern: values.pattern,
    verbose: values.verbose,
  };
}

// Commands

/**
 * Convert every file of `directory` matching the configured pattern, skipping malformed ones
 */
export async function convertDirectory(
  directory: string,
  config: ResolvedConfig,
  logger: Logger
): Promise<DirectoryResult> {
  const result: DirectoryResult = { written: [], skipped: [] };
  const files = (await glob(config.pattern, { cwd: directory, nodir: true })).sort();

  logger.debug(`Found ${files.length} file(s) matching ${config.pattern} in ${directory}`);
  await fs.mkdir(config.outDir, { recursive: true });

  for (const file of files) {
    const text = await fs.readFile(path.join(directory, file), 'utf-8');

    let markdown: string;
    let group: string;
    try {
      const root = parseXml(text);
      markdown = renderDocument(readDocument(root));
      group = groupForDocument(root);
    } catch (error) {
      if (error instanceof MalformedInputError) {
        logger.warn(`Skipping ${path.basename(file)}: not valid Doxygen XML (${error.message})`);
        result.skipped.push(file);
        continue;
      }
      throw error;
    }

    const groupDir = path.join(config.outDir, toGroupDirectory(group));
    await fs.mkdir(groupDir, { recursive: true });

    const outFile = path.join(groupDir, `${path.basename(file, path.extname(file))}.md`);
    await fs.writeFile(outFile, markdown, 'utf-8');
    logger.info(`Wrote ${outFile}`);
    result.written.push(outFile);
  }

  return result;
}

async function convertSingle(source: string | undefined, io: CliIO): Promise<void> {
  const text = source === undefined ? await io.readStdin() : await fs.readFile(source, 'utf-8');
  io.stdout(convert(text));
}

// Main

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    const logger = io.logger ?? createLogger(false);
    logger.error(`Error parsing arguments: ${error instanceof Error ? error.message : String(error)}`);
    io.stdout(HELP_TEXT);
    return 2;
  }

  if (args.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  if (args.version) {
    io.stdout(`doxygen-md version ${VERSION}\n`);
    return 0;
  }

  let logger = io.logger ?? createLogger(false);
  try {
    const config = resolveConfig(
      { input: args.input, outDir: args.outDir, pattern: args.pattern, verbose: args.verbose },
      io.env
    );
    logger = io.logger ?? createLogger(config.verbose);
    logger.debug('Configuration:', config);

    if (config.input !== undefined && (await fs.stat(config.input)).isDirectory()) {
      const result = await convertDirectory(config.input, config, logger);
      logger.debug(`Converted ${result.written.length} file(s), skipped ${result.skipped.length}`);
    } else {
      await convertSingle(config.input, io);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message);
    if (isDoxygenMdError(error) && error.hint) {
      logger.info(error.hint);
    }
    return getExitCode(error);
  }
}
