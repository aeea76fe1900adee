import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { SymbolEntry } from '../formats/types.js';
import type {
  Identifier,
  OpNode,
  PrimitiveInstructionNode,
  PrimitiveMnemonic,
  PrimitiveProgram,
  SourceSpan,
} from '../model/program.js';
import type { AddressingMode } from '../machine/opcodes.js';
import type { Layout } from './layout.js';
import { classifyOperand } from './layout.js';

/**
 * Identifier -> absolute address in the emitted image.
 */
export type SymbolTable = Map<Identifier, number>;

export interface ResolvedOperand {
  mode: AddressingMode;
  /** Final operand word: an address for references, the literal or initial value otherwise. */
  value: number;
}

/**
 * An instruction whose operands are all concrete words.
 */
export type ResolvedInstruction =
  | {
      kind: 'op';
      mnemonic: PrimitiveMnemonic;
      operands: ResolvedOperand[];
      span?: SourceSpan;
    }
  | { kind: 'label'; name: Identifier; span?: SourceSpan }
  | { kind: 'data'; name: Identifier; value: number; span?: SourceSpan };

function diagAt(
  diagnostics: Diagnostic[],
  id: typeof DiagnosticIds.DuplicateAnchor | typeof DiagnosticIds.UndefinedSymbol,
  file: string,
  span: SourceSpan | undefined,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: span?.file ?? file,
    ...(span ? { line: span.start.line, column: span.start.column } : {}),
  });
}

function symbolKind(node: PrimitiveInstructionNode): SymbolEntry['kind'] {
  if (node.kind === 'Label') return 'label';
  if (node.kind === 'Var') return 'var';
  return 'anchor';
}

/**
 * Pass 1: assign every declared identifier its absolute address.
 *
 * Walks the program once with a running word index. An anchor in slot `k` lands at
 * `index + 1 + k + adjust`: one word for the opcode, then the operand words. Pseudo-instructions carry
 * `adjust = -1`, so their anchor lands on `index` itself.
 *
 * Redeclaring an identifier appends `DuplicateAnchor`; the first declaration keeps its address.
 */
export function buildSymbolTable(
  program: PrimitiveProgram,
  layouts: readonly Layout[],
  diagnostics: Diagnostic[],
): { table: SymbolTable; symbols: SymbolEntry[] } {
  const table: SymbolTable = new Map();
  const symbols: SymbolEntry[] = [];
  let index = 0;

  program.instructions.forEach((node, i) => {
    const layout = layouts[i];
    if (!layout) return;
    layout.anchors.forEach((name, slot) => {
      if (name === undefined) return;
      const address = index + 1 + slot + layout.adjust;
      const prior = table.get(name);
      if (prior !== undefined) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateAnchor,
          program.file,
          node.span,
          `Duplicate anchor "${name}" (already declared at address ${prior}).`,
        );
        return;
      }
      table.set(name, address);
      symbols.push({
        kind: symbolKind(node),
        name,
        address,
        ...(node.span ? { file: node.span.file, line: node.span.start.line } : {}),
      });
    });
    index += layout.size;
  });

  return { table, symbols };
}

function resolveOp(
  node: OpNode<PrimitiveMnemonic>,
  table: SymbolTable,
  file: string,
  diagnostics: Diagnostic[],
): ResolvedInstruction {
  const operands = node.operands.map((o, index): ResolvedOperand => {
    const info = classifyOperand(o);
    switch (info.kind) {
      case 'literal':
        return { mode: info.mode, value: info.value };
      case 'anchor':
        return { mode: info.mode, value: info.initial };
      case 'reference': {
        const address = table.get(info.name);
        if (address === undefined) {
          diagAt(
            diagnostics,
            DiagnosticIds.UndefinedSymbol,
            file,
            node.span,
            `Undefined symbol "${info.name}" in ${node.mnemonic} operand ${index + 1}.`,
          );
          return { mode: info.mode, value: 0 };
        }
        return { mode: info.mode, value: address };
      }
    }
  });
  return {
    kind: 'op',
    mnemonic: node.mnemonic,
    operands,
    ...(node.span ? { span: node.span } : {}),
  };
}

/**
 * Pass 2: substitute every reference with its address from the completed table.
 *
 * Anchors become their initial value at the point of definition; `VAR` becomes a data word holding its
 * initial value (default 0). A reference to an identifier absent from the table appends `UndefinedSymbol`.
 */
export function resolveProgram(
  program: PrimitiveProgram,
  table: SymbolTable,
  diagnostics: Diagnostic[],
): ResolvedInstruction[] {
  return program.instructions.map((node): ResolvedInstruction => {
    const span = node.span ? { span: node.span } : {};
    switch (node.kind) {
      case 'Label':
        return { kind: 'label', name: node.name, ...span };
      case 'Var':
        return { kind: 'data', name: node.name, value: node.initial ?? 0, ...span };
      case 'Op':
        return resolveOp(node, table, program.file, diagnostics);
    }
  });
}
