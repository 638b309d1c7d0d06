// @narrowpack/cli
// Command implementations and the commander program, for embedding and tests

export { createProgram, createProcessIO, VERSION, type CliIO } from './program.js';
export { packCommand } from './commands/pack.js';
export { unpackCommand } from './commands/unpack.js';
export { layoutCommand, formatLayoutTable } from './commands/layout.js';
export { encodeBytes, decodeBytes, parseValues, isByteFormat } from './encoding.js';
export {
  BYTE_FORMATS,
  type ByteFormat,
  type PackOptions,
  type PackResult,
  type UnpackOptions,
  type UnpackResult,
  type LayoutOptions,
  type LayoutResult,
} from './types.js';
