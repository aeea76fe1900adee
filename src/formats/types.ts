/**
 * Emitted program image: the flat word sequence loaded at address 0, plus an emission trace.
 */
export interface EmittedImage {
  words: number[];
  /**
   * Deterministic emission trace, in address order.
   *
   * Used by the listing writer to show labels and instruction boundaries without guessing them from the words.
   */
  trace: EmittedTraceEntry[];
}

/**
 * Emission trace entry. `offset` is the absolute address of the first word.
 */
export type EmittedTraceEntry =
  | { kind: 'label'; offset: number; name: string }
  | { kind: 'instruction'; offset: number; text: string; words: number[] }
  | { kind: 'data'; offset: number; name: string; words: number[] };

/**
 * A declared identifier and its resolved address.
 */
export interface SymbolEntry {
  /** `label` for `LBL`, `var` for `VAR`, `anchor` for `#name` / `&#name` operands. */
  kind: 'label' | 'var' | 'anchor';
  name: string;
  address: number;
  file?: string;
  line?: number;
}

/**
 * Options for image text writing.
 */
export interface WriteImageOptions {
  /**
   * Line ending appended after the word list.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for symbol-map writing (reserved for future options).
 */
export interface WriteSymbolsOptions {}

/**
 * In-memory image artifact: comma-separated decimal words.
 */
export interface ImageArtifact {
  kind: 'image';
  path?: string;
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * In-memory symbol-map artifact.
 */
export interface SymbolMapArtifact {
  kind: 'sym';
  path?: string;
  json: SymbolMapJson;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = ImageArtifact | ListingArtifact | SymbolMapArtifact;

/**
 * Symbol map v1 JSON shape.
 */
export type SymbolMapJson = {
  format: 'llir-symbol-map';
  version: 1;
  /** Image length in words. */
  size: number;
  symbols: Array<{ name: string; kind: SymbolEntry['kind']; address: number; line?: number }>;
};

/**
 * Format writers used by the pipeline to turn the emitted image and symbols into artifacts.
 */
export interface FormatWriters {
  writeImage(image: EmittedImage, symbols: SymbolEntry[], opts?: WriteImageOptions): ImageArtifact;
  writeSymbols(
    image: EmittedImage,
    symbols: SymbolEntry[],
    opts?: WriteSymbolsOptions,
  ): SymbolMapArtifact;
  writeListing?(
    image: EmittedImage,
    symbols: SymbolEntry[],
    opts?: WriteListingOptions,
  ): ListingArtifact;
}
