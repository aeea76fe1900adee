import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import type { EmittedImage, SymbolEntry } from './formats/types.js';
import type { PrimitiveProgram, Program } from './model/program.js';
import { desugarProgram } from './lowering/desugar.js';
import { emitProgram } from './lowering/emit.js';
import { checkProgram } from './semantics/check.js';
import type { Layout } from './semantics/layout.js';
import { layoutProgram } from './semantics/layout.js';
import type { ResolvedInstruction, SymbolTable } from './semantics/symbols.js';
import { buildSymbolTable, resolveProgram } from './semantics/symbols.js';

/**
 * Everything the assembler derives from a program, in pass order.
 */
export interface AssembledProgram {
  primitive: PrimitiveProgram;
  layouts: Layout[];
  table: SymbolTable;
  symbols: SymbolEntry[];
  resolved: ResolvedInstruction[];
  image: EmittedImage;
}

/**
 * Assemble an LLIR program into a flat image.
 *
 * Passes: check -> rewrite derived instructions -> layout -> symbol table -> substitution -> emission.
 * Each pass appends to `diagnostics`; assembly stops after the first pass that reports an error and returns
 * `undefined`. Entries already in `diagnostics` when the call starts do not affect the result.
 */
export function assembleProgram(
  program: Program,
  diagnostics: Diagnostic[],
): AssembledProgram | undefined {
  const before = diagnostics.length;
  const failed = (): boolean => hasErrors(diagnostics.slice(before));

  checkProgram(program, diagnostics);
  if (failed()) return undefined;

  const primitive = desugarProgram(program);
  const layouts = layoutProgram(primitive);

  const { table, symbols } = buildSymbolTable(primitive, layouts, diagnostics);
  if (failed()) return undefined;

  const resolved = resolveProgram(primitive, table, diagnostics);
  if (failed()) return undefined;

  const image = emitProgram(resolved);
  return { primitive, layouts, table, symbols, resolved, image };
}
