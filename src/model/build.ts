import type {
  Identifier,
  ImmediateAnchorOperand,
  ImmediateOperand,
  InstructionNode,
  LabelNode,
  LabelOperand,
  Mnemonic,
  OpNode,
  Operand,
  PositionAnchorOperand,
  PositionOperand,
  Program,
  RelativeOperand,
  SourceSpan,
  VarNode,
} from './program.js';

// Builders mirroring the LLIR surface forms. Parsers and tests use these instead of object literals.

/** `-12` */
export const imm = (value: number): ImmediateOperand => ({ kind: 'Immediate', value });

/** `&name` */
export const pos = (name: Identifier): PositionOperand => ({ kind: 'Position', name });

/** `@name` */
export const rel = (name: Identifier): RelativeOperand => ({ kind: 'Relative', name });

/** `$name` */
export const label = (name: Identifier): LabelOperand => ({ kind: 'Label', name });

/** `[initial]#name` */
export const anchor = (name: Identifier, initial = 0): ImmediateAnchorOperand => ({
  kind: 'ImmediateAnchor',
  name,
  initial,
});

/** `[initial]&#name` */
export const posAnchor = (name: Identifier, initial = 0): PositionAnchorOperand => ({
  kind: 'PositionAnchor',
  name,
  initial,
});

export function op<M extends Mnemonic>(mnemonic: M, ...operands: Operand[]): OpNode<M> {
  return { kind: 'Op', mnemonic, operands };
}

/** `LBL name` */
export function lbl(name: Identifier): LabelNode {
  return { kind: 'Label', name };
}

/** `VAR name` */
export function variable(name: Identifier, initial?: number): VarNode {
  return initial === undefined ? { kind: 'Var', name } : { kind: 'Var', name, initial };
}

/**
 * Attach a source span to an instruction (returns a copy).
 */
export function at<I extends InstructionNode>(node: I, span: SourceSpan): I {
  return { ...node, span };
}

export function program(instructions: InstructionNode[], file = '<program>'): Program {
  return { file, instructions };
}
