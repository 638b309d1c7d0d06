/**
 * @narrowpack/cli Program
 *
 * Builds the commander program. Output, environment and working directory
 * come from a CliIO so the program can run in-process.
 */

import { Command } from 'commander';
import type { Logger } from '@narrowpack/core';
import {
  createLoggerFromConfig,
  getConfigFromEnv,
  validateConfig,
  type NarrowPackConfig,
} from '@narrowpack/config';

import { packCommand } from './commands/pack.js';
import { unpackCommand } from './commands/unpack.js';
import { formatLayoutTable, layoutCommand } from './commands/layout.js';
import { parseByteFormat, parseInteger } from './encoding.js';
import type { ByteFormat } from './types.js';

export const VERSION = '0.1.0';

/**
 * Where the program reads its environment and writes its output
 */
export interface CliIO {
  writeOut(text: string): void;
  writeErr(text: string): void;
  env: Record<string, string | undefined>;
  cwd: string;
}

export function createProcessIO(): CliIO {
  return {
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
  };
}

interface PackCommandLine {
  width: number;
  input?: string;
  format: ByteFormat;
}

interface UnpackCommandLine {
  width: number;
  count: number;
  format: ByteFormat;
}

interface LayoutCommandLine {
  width?: number;
}

/**
 * Create the narrowpack program.
 *
 * Commander exits are overridden: a failed command or bad usage rejects
 * parseAsync() with a CommanderError carrying the exit code.
 */
export function createProgram(io: CliIO = createProcessIO()): Command {
  const program = new Command();

  program
    .name('narrowpack')
    .description('Pack small unsigned integers at 0-8 bits each')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });

  const print = (line: string): void => io.writeOut(`${line}\n`);

  const fail = (message: string): never =>
    program.error(`Error: ${message}`, { exitCode: 1, code: 'narrowpack.failed' });

  /**
   * Load and validate configuration from the environment
   */
  const setup = (): { config: NarrowPackConfig; logger: Logger } => {
    const config = getConfigFromEnv({ env: io.env });
    const result = validateConfig(config);
    if (!result.valid) {
      const details = result.errors.map((error) => `  ${error.path}: ${error.message}`);
      return fail(['Invalid configuration:', ...details].join('\n'));
    }
    const logger = createLoggerFromConfig(config, (line) => io.writeErr(`${line}\n`));
    for (const warning of result.warnings) {
      logger.warn(warning.message, { path: warning.path });
    }
    return { config, logger };
  };

  program
    .command('pack')
    .description('Pack values and print the bytes')
    .argument('[values...]', 'Values, separated by spaces or commas')
    .requiredOption('-w, --width <bits>', 'Bits per value (0-8)', parseInteger)
    .option('-i, --input <file>', 'Read further values from a file')
    .option('-f, --format <format>', 'Output encoding: hex or base64', parseByteFormat, 'hex')
    .action(async (values: string[], options: PackCommandLine) => {
      const { config, logger } = setup();
      const result = await packCommand({
        width: options.width,
        values,
        input: options.input,
        cwd: io.cwd,
        format: options.format,
        config,
        logger,
      });

      if (!result.success) {
        fail(result.error ?? 'Pack failed');
      }
      print(result.output);
    });

  program
    .command('unpack')
    .description('Unpack bytes and print the values')
    .argument('<data>', 'Packed bytes, hex or base64')
    .requiredOption('-w, --width <bits>', 'Bits per value (0-8)', parseInteger)
    .requiredOption('-n, --count <count>', 'Number of values to read', parseInteger)
    .option('-f, --format <format>', 'Input encoding: hex or base64', parseByteFormat, 'hex')
    .action(async (data: string, options: UnpackCommandLine) => {
      const { config, logger } = setup();
      const result = await unpackCommand({
        width: options.width,
        count: options.count,
        data,
        format: options.format,
        config,
        logger,
      });

      if (!result.success) {
        fail(result.error ?? 'Unpack failed');
      }
      print(result.values.join(' '));
    });

  program
    .command('layout')
    .description('Show values and bytes per group for each width')
    .option('-w, --width <bits>', 'Only this width', parseInteger)
    .action(async (options: LayoutCommandLine) => {
      const result = await layoutCommand({ width: options.width });

      if (!result.success) {
        fail(result.error ?? 'Layout failed');
      }
      formatLayoutTable(result.layouts).forEach(print);
    });

  return program;
}
