import type { FormatWriters } from './types.js';
import { writeImage } from './writeImage.js';
import { writeListing } from './writeListing.js';
import { writeSymbols } from './writeSymbols.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeImage,
  writeSymbols,
  writeListing,
};
