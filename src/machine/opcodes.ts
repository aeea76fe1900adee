import type { PrimitiveMnemonic } from '../model/program.js';
import { PRIMITIVE_MNEMONICS } from '../model/program.js';

/**
 * Machine opcodes. The numeric values are the image encoding.
 */
export const Opcode = {
  Add: 1,
  Multiply: 2,
  Input: 3,
  Output: 4,
  JumpIfNonZero: 5,
  JumpIfZero: 6,
  LessThan: 7,
  Equals: 8,
  AdjustRelativeBase: 9,
  Halt: 99,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

/**
 * Operand addressing modes, as encoded in the mode digits of an instruction word.
 */
export const AddressingMode = {
  /** The word is an address; the operand is `tape[word]`. */
  Position: 0,
  /** The word is the operand. */
  Immediate: 1,
  /** The word is an offset from the relative base; the operand is `tape[relativeBase + word]`. */
  Relative: 2,
} as const;

export type AddressingMode = (typeof AddressingMode)[keyof typeof AddressingMode];

export const PARAMETER_COUNT: Readonly<Record<Opcode, number>> = {
  [Opcode.Add]: 3,
  [Opcode.Multiply]: 3,
  [Opcode.Input]: 1,
  [Opcode.Output]: 1,
  [Opcode.JumpIfNonZero]: 2,
  [Opcode.JumpIfZero]: 2,
  [Opcode.LessThan]: 3,
  [Opcode.Equals]: 3,
  [Opcode.AdjustRelativeBase]: 1,
  [Opcode.Halt]: 0,
};

export const MNEMONIC_OPCODE: Readonly<Record<PrimitiveMnemonic, Opcode>> = {
  ADD: Opcode.Add,
  MUL: Opcode.Multiply,
  IN: Opcode.Input,
  OUT: Opcode.Output,
  JIT: Opcode.JumpIfNonZero,
  JIF: Opcode.JumpIfZero,
  LESS: Opcode.LessThan,
  EQ: Opcode.Equals,
  ARB: Opcode.AdjustRelativeBase,
  HALT: Opcode.Halt,
};

const OPCODE_MNEMONIC = new Map<number, PrimitiveMnemonic>(
  PRIMITIVE_MNEMONICS.map((m): [number, PrimitiveMnemonic] => [MNEMONIC_OPCODE[m], m]),
);

export function isOpcode(value: number): value is Opcode {
  return OPCODE_MNEMONIC.has(value);
}

export function mnemonicForOpcode(opcode: Opcode): PrimitiveMnemonic | undefined {
  return OPCODE_MNEMONIC.get(opcode);
}

/** Weight of the mode digit for operands 1..3 in the instruction word. */
const MODE_WEIGHTS = [100, 1000, 10000] as const;

/**
 * Synthesize an instruction word: `opcode + 100*mode1 + 1000*mode2 + 10000*mode3`.
 *
 * Missing modes count as position (0).
 */
export function encodeWord(opcode: Opcode, modes: readonly AddressingMode[]): number {
  let word: number = opcode;
  modes.forEach((mode, index) => {
    const weight = MODE_WEIGHTS[index];
    if (weight !== undefined) word += weight * mode;
  });
  return word;
}

export interface DecodedWord {
  /** `word mod 100`; may not be a valid opcode. */
  opcode: number;
  /** Mode digits for operands 1..3; may hold digits outside 0..2. */
  modes: [number, number, number];
}

/**
 * Split an instruction word into its opcode and the three mode digits.
 *
 * A negative word yields a negative opcode, which is never valid.
 */
export function decodeWord(word: number): DecodedWord {
  return {
    opcode: word % 100,
    modes: [Math.trunc(word / 100) % 10, Math.trunc(word / 1000) % 10, Math.trunc(word / 10000) % 10],
  };
}
