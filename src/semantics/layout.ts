import type {
  Identifier,
  Operand,
  PrimitiveInstructionNode,
  PrimitiveProgram,
} from '../model/program.js';
import { MNEMONIC_ARITY } from '../model/program.js';
import { AddressingMode } from '../machine/opcodes.js';

/**
 * What a single operand contributes to layout and resolution.
 *
 * - `literal`: the word is known now.
 * - `reference`: the word is the address of `name`, known after pass 1.
 * - `anchor`: the word is `initial`, and its own address is declared as `name`.
 */
export type OperandInfo =
  | { kind: 'literal'; value: number; mode: AddressingMode }
  | { kind: 'reference'; name: Identifier; mode: AddressingMode }
  | { kind: 'anchor'; name: Identifier; initial: number; mode: AddressingMode };

export function classifyOperand(o: Operand): OperandInfo {
  switch (o.kind) {
    case 'Immediate':
      return { kind: 'literal', value: o.value, mode: AddressingMode.Immediate };
    case 'Position':
      return { kind: 'reference', name: o.name, mode: AddressingMode.Position };
    case 'Relative':
      return { kind: 'reference', name: o.name, mode: AddressingMode.Relative };
    case 'Label':
      return { kind: 'reference', name: o.name, mode: AddressingMode.Immediate };
    case 'ImmediateAnchor':
      return { kind: 'anchor', name: o.name, initial: o.initial, mode: AddressingMode.Immediate };
    case 'PositionAnchor':
      return { kind: 'anchor', name: o.name, initial: o.initial, mode: AddressingMode.Position };
  }
}

export type AnchorSlots = [Identifier | undefined, Identifier | undefined, Identifier | undefined];

export interface Layout {
  /** Emitted word count. */
  size: number;
  /** Identifier declared by operand 1..3 (or by the pseudo-instruction itself, in slot 0). */
  anchors: AnchorSlots;
  /**
   * Correction applied to anchor addresses.
   *
   * `0` for instructions that start with an opcode word; `-1` for pseudo-instructions, which have none, so
   * their anchor lands on the word the next emission starts at.
   */
  adjust: number;
}

/**
 * Compute the layout of one primitive instruction.
 */
export function layoutInstruction(node: PrimitiveInstructionNode): Layout {
  switch (node.kind) {
    case 'Label':
      return { size: 0, anchors: [node.name, undefined, undefined], adjust: -1 };
    case 'Var':
      return { size: 1, anchors: [node.name, undefined, undefined], adjust: -1 };
    case 'Op': {
      const anchors: AnchorSlots = [undefined, undefined, undefined];
      node.operands.slice(0, 3).forEach((o, index) => {
        const info = classifyOperand(o);
        if (info.kind === 'anchor') anchors[index] = info.name;
      });
      return { size: 1 + MNEMONIC_ARITY[node.mnemonic], anchors, adjust: 0 };
    }
  }
}

/**
 * Compute per-instruction layouts, in program order.
 */
export function layoutProgram(program: PrimitiveProgram): Layout[] {
  return program.instructions.map(layoutInstruction);
}

/**
 * Total emitted word count for a set of layouts.
 */
export function imageSize(layouts: readonly Layout[]): number {
  return layouts.reduce((sum, l) => sum + l.size, 0);
}
