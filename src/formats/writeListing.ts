import type { EmittedImage, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';
import { sortSymbols } from './writeSymbols.js';

const WORDS_COLUMN = 24;

function toAddress(n: number): string {
  return n.toString().padStart(4, '0');
}

function codeLine(offset: number, words: number[], text: string): string {
  return `${toAddress(offset)}: ${words.join(' ').padEnd(WORDS_COLUMN, ' ')}  ${text}`;
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * One line per emitted instruction or data word (address, words, decoded text), `name:` lines at labels,
 * then the symbol table.
 */
export function writeListing(
  image: EmittedImage,
  symbols: SymbolEntry[],
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  lines.push('; LLIR listing');
  lines.push(`; size: ${image.words.length} words`);
  lines.push('');

  for (const entry of image.trace) {
    switch (entry.kind) {
      case 'label':
        lines.push(`${entry.name}:`);
        break;
      case 'data':
        lines.push(codeLine(entry.offset, entry.words, `VAR ${entry.name}`));
        break;
      case 'instruction':
        lines.push(codeLine(entry.offset, entry.words, entry.text));
        break;
    }
  }

  lines.push('');
  lines.push('; symbols:');
  for (const s of sortSymbols(symbols)) {
    lines.push(`; ${s.kind} ${s.name} = ${s.address}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
