import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import type { Artifact } from './formats/types.js';
import type { Program } from './model/program.js';
import { assembleProgram } from './assemble.js';

type ResolvedOptions = Required<CompilerOptions>;

export function withDefaults(options: CompilerOptions): ResolvedOptions {
  return {
    emitImage: options.emitImage ?? true,
    // Listing and symbol map are sidecar artifacts: on unless explicitly suppressed.
    emitListing: options.emitListing ?? true,
    emitSymbols: options.emitSymbols ?? true,
    lineEnding: options.lineEnding ?? '\n',
  };
}

/**
 * Compile an LLIR program into an image plus the requested artifacts.
 *
 * Artifacts are produced in memory via `deps.formats`; nothing touches the filesystem.
 */
export const compile: CompileFn = (
  program: Program,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult => {
  const diagnostics: Diagnostic[] = [];
  const assembled = assembleProgram(program, diagnostics);
  if (!assembled) return { diagnostics, artifacts: [], image: [], symbols: [] };

  const { image, symbols } = assembled;
  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitImage) {
    artifacts.push(deps.formats.writeImage(image, symbols, { lineEnding: emit.lineEnding }));
  }
  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(image, symbols, { lineEnding: emit.lineEnding }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: program.file,
      });
    }
  }
  if (emit.emitSymbols) {
    artifacts.push(deps.formats.writeSymbols(image, symbols));
  }

  return { diagnostics, artifacts, image: [...image.words], symbols };
};
