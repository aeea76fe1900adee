/**
 * Program model contracts for LLIR.
 *
 * This module defines types only. Construction helpers live in `build.ts`; validation lives in
 * `semantics/check.ts`.
 */

export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
}

/**
 * Source location supplied by whatever produced the program (usually a parser).
 */
export interface SourceSpan {
  file: string;
  start: SourcePosition;
}

/**
 * Symbolic name of an anchor, label or variable. Compared by value.
 */
export type Identifier = string;

/** Literal integer, immediate mode. Surface form: `-12`. */
export interface ImmediateOperand {
  kind: 'Immediate';
  value: number;
}

/** Reference whose word holds the named address, position mode. Surface form: `&name`. */
export interface PositionOperand {
  kind: 'Position';
  name: Identifier;
}

/** Reference whose word holds the named address, relative mode. Surface form: `@name`. */
export interface RelativeOperand {
  kind: 'Relative';
  name: Identifier;
}

/** Reference whose word holds the named address, immediate mode. Surface form: `$name`. */
export interface LabelOperand {
  kind: 'Label';
  name: Identifier;
}

/**
 * Declares `name` at the address of this operand word and stores `initial` there, immediate mode.
 * Surface form: `[initial]#name`.
 */
export interface ImmediateAnchorOperand {
  kind: 'ImmediateAnchor';
  name: Identifier;
  initial: number;
}

/**
 * Declares `name` at the address of this operand word and stores `initial` there, position mode.
 * Surface form: `[initial]&#name`.
 */
export interface PositionAnchorOperand {
  kind: 'PositionAnchor';
  name: Identifier;
  initial: number;
}

export type ReferenceOperand = PositionOperand | RelativeOperand | LabelOperand;
export type AnchorOperand = ImmediateAnchorOperand | PositionAnchorOperand;
export type Operand = ImmediateOperand | ReferenceOperand | AnchorOperand;

/**
 * Mnemonics with a machine opcode of their own.
 *
 * Operands are destination-last: `ADD a b dest`, `LESS a b dest`, `JIT cond target`.
 */
export type PrimitiveMnemonic =
  | 'ADD'
  | 'MUL'
  | 'IN'
  | 'OUT'
  | 'JIT'
  | 'JIF'
  | 'LESS'
  | 'EQ'
  | 'ARB'
  | 'HALT';

/**
 * Mnemonics rewritten into primitives before layout.
 *
 * - `COPY src dest`
 * - `JUMP target`
 * - `IADD dest value`, `IMUL dest value`
 */
export type DerivedMnemonic = 'COPY' | 'JUMP' | 'IADD' | 'IMUL';

export type Mnemonic = PrimitiveMnemonic | DerivedMnemonic;

export const MNEMONIC_ARITY: Readonly<Record<Mnemonic, number>> = {
  ADD: 3,
  MUL: 3,
  IN: 1,
  OUT: 1,
  JIT: 2,
  JIF: 2,
  LESS: 3,
  EQ: 3,
  ARB: 1,
  HALT: 0,
  COPY: 2,
  JUMP: 1,
  IADD: 2,
  IMUL: 2,
};

export const PRIMITIVE_MNEMONICS: readonly PrimitiveMnemonic[] = [
  'ADD',
  'MUL',
  'IN',
  'OUT',
  'JIT',
  'JIF',
  'LESS',
  'EQ',
  'ARB',
  'HALT',
];

export function isPrimitiveMnemonic(m: Mnemonic): m is PrimitiveMnemonic {
  return m !== 'COPY' && m !== 'JUMP' && m !== 'IADD' && m !== 'IMUL';
}

export interface OpNode<M extends Mnemonic = Mnemonic> {
  kind: 'Op';
  mnemonic: M;
  operands: Operand[];
  span?: SourceSpan;
}

/**
 * Zero-width pseudo-instruction naming the address of the following real instruction.
 * Surface form: `LBL name`.
 */
export interface LabelNode {
  kind: 'Label';
  name: Identifier;
  span?: SourceSpan;
}

/**
 * Pseudo-instruction reserving one data word at its own address. Surface form: `VAR name`.
 */
export interface VarNode {
  kind: 'Var';
  name: Identifier;
  /** Defaults to 0. */
  initial?: number;
  span?: SourceSpan;
}

export type InstructionNode = OpNode | LabelNode | VarNode;

/**
 * Instruction after the derived-instruction rewrite pass.
 */
export type PrimitiveInstructionNode = OpNode<PrimitiveMnemonic> | LabelNode | VarNode;

/**
 * An LLIR program. Instruction order defines the emitted layout and control flow.
 */
export interface Program<I extends InstructionNode = InstructionNode> {
  /** User-facing source name used in diagnostics. */
  file: string;
  instructions: I[];
}

export type PrimitiveProgram = Program<PrimitiveInstructionNode>;
