import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, SymbolEntry } from './formats/types.js';
import type { Program } from './model/program.js';

/**
 * Options that influence which artifacts are produced.
 */
export interface CompilerOptions {
  /** Emit the comma-separated image text (default on). */
  emitImage?: boolean;
  /** Emit the listing (default on; skipped with a warning when no listing writer is configured). */
  emitListing?: boolean;
  /** Emit the JSON symbol map (default on). */
  emitSymbols?: boolean;
  /** Line ending for text artifacts (default `\n`). */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run.
 *
 * `image` and `symbols` are empty when any error diagnostic was produced.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** The loadable image. */
  image: number[];
  symbols: SymbolEntry[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  program: Program,
  options: CompilerOptions,
  deps: PipelineDeps,
) => CompileResult;
