import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { InstructionNode, Mnemonic, Operand, Program } from '../model/program.js';
import { MNEMONIC_ARITY } from '../model/program.js';

function diagAt(
  diagnostics: Diagnostic[],
  program: Program,
  node: InstructionNode,
  message: string,
): void {
  diagnostics.push({
    id: DiagnosticIds.MalformedOperand,
    severity: 'error',
    message,
    file: node.span?.file ?? program.file,
    ...(node.span ? { line: node.span.start.line, column: node.span.start.column } : {}),
  });
}

/**
 * Operand slots each mnemonic stores into.
 */
const WRITE_SLOTS: Readonly<Record<Mnemonic, readonly number[]>> = {
  ADD: [2],
  MUL: [2],
  IN: [0],
  OUT: [],
  JIT: [],
  JIF: [],
  LESS: [2],
  EQ: [2],
  ARB: [],
  HALT: [],
  COPY: [1],
  JUMP: [],
  IADD: [],
  IMUL: [],
};

function isInPlace(m: Mnemonic): boolean {
  return m === 'IADD' || m === 'IMUL';
}

function describeOperand(o: Operand): string {
  switch (o.kind) {
    case 'Immediate':
      return `immediate ${o.value}`;
    case 'Position':
      return `&${o.name}`;
    case 'Relative':
      return `@${o.name}`;
    case 'Label':
      return `$${o.name}`;
    case 'ImmediateAnchor':
      return `${o.initial}#${o.name}`;
    case 'PositionAnchor':
      return `${o.initial}&#${o.name}`;
  }
}

function operandName(o: Operand): string | undefined {
  return o.kind === 'Immediate' ? undefined : o.name;
}

function operandLiteral(o: Operand): number | undefined {
  if (o.kind === 'Immediate') return o.value;
  if (o.kind === 'ImmediateAnchor' || o.kind === 'PositionAnchor') return o.initial;
  return undefined;
}

/**
 * Reject programs the later passes cannot lower.
 *
 * Appends `MalformedOperand` errors for:
 * - operand count differing from the mnemonic's arity;
 * - non-integer literals and empty identifiers;
 * - a store slot that would be encoded in immediate mode (`Immediate`, `Label`, `ImmediateAnchor`);
 * - an `IADD`/`IMUL` destination that cannot be both read and written (`Immediate`, `Label`,
 *   `PositionAnchor`).
 */
export function checkProgram(program: Program, diagnostics: Diagnostic[]): void {
  for (const node of program.instructions) {
    if (node.kind === 'Label') {
      if (node.name.length === 0) diagAt(diagnostics, program, node, 'LBL requires a name.');
      continue;
    }
    if (node.kind === 'Var') {
      if (node.name.length === 0) diagAt(diagnostics, program, node, 'VAR requires a name.');
      if (node.initial !== undefined && !Number.isSafeInteger(node.initial)) {
        diagAt(
          diagnostics,
          program,
          node,
          `VAR ${node.name} initial value must be an integer (got ${node.initial}).`,
        );
      }
      continue;
    }

    const arity = MNEMONIC_ARITY[node.mnemonic];
    if (node.operands.length !== arity) {
      diagAt(
        diagnostics,
        program,
        node,
        `${node.mnemonic} expects ${arity} operand${arity === 1 ? '' : 's'}, got ${node.operands.length}.`,
      );
      continue;
    }

    node.operands.forEach((o, index) => {
      const name = operandName(o);
      if (name !== undefined && name.length === 0) {
        diagAt(diagnostics, program, node, `${node.mnemonic} operand ${index + 1} has an empty name.`);
      }
      const literal = operandLiteral(o);
      if (literal !== undefined && !Number.isSafeInteger(literal)) {
        diagAt(
          diagnostics,
          program,
          node,
          `${node.mnemonic} operand ${index + 1} must be an integer (got ${literal}).`,
        );
      }
    });

    for (const slot of WRITE_SLOTS[node.mnemonic]) {
      const target = node.operands[slot];
      if (!target) continue;
      if (target.kind === 'Immediate' || target.kind === 'Label' || target.kind === 'ImmediateAnchor') {
        diagAt(
          diagnostics,
          program,
          node,
          `${node.mnemonic} cannot store into ${describeOperand(target)} (immediate-mode write target).`,
        );
      }
    }

    if (isInPlace(node.mnemonic)) {
      const dest = node.operands[0];
      if (dest && (dest.kind === 'Immediate' || dest.kind === 'Label' || dest.kind === 'PositionAnchor')) {
        diagAt(
          diagnostics,
          program,
          node,
          `${node.mnemonic} destination must be &name, @name or #name (got ${describeOperand(dest)}).`,
        );
      }
    }
  }
}
