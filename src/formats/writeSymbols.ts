import type {
  EmittedImage,
  SymbolEntry,
  SymbolMapArtifact,
  SymbolMapJson,
  WriteSymbolsOptions,
} from './types.js';

export function sortSymbols(symbols: readonly SymbolEntry[]): SymbolEntry[] {
  return [...symbols].sort((a, b) => {
    if (a.address !== b.address) return a.address - b.address;
    return a.name.localeCompare(b.name);
  });
}

/**
 * Create the JSON symbol map: image size plus every declared identifier, ordered by address then name.
 */
export function writeSymbols(
  image: EmittedImage,
  symbols: SymbolEntry[],
  _opts?: WriteSymbolsOptions,
): SymbolMapArtifact {
  const json: SymbolMapJson = {
    format: 'llir-symbol-map',
    version: 1,
    size: image.words.length,
    symbols: sortSymbols(symbols).map((s) => ({
      name: s.name,
      kind: s.kind,
      address: s.address,
      ...(s.line !== undefined ? { line: s.line } : {}),
    })),
  };
  return { kind: 'sym', json };
}
