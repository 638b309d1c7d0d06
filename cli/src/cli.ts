#!/usr/bin/env node
/**
 * @narrowpack/cli
 *
 * Command-line interface for the narrowpack codec.
 *
 * Commands:
 *   narrowpack pack --width <bits> [values...]        Pack values, print hex/base64
 *   narrowpack unpack --width <bits> --count <n> <data>  Print unpacked values
 *   narrowpack layout [--width <bits>]                 Show group layouts
 *
 * Configuration is read from NARROWPACK_* environment variables.
 */

import { CommanderError } from 'commander';

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error(error);
    process.exitCode = 1;
  });
