import type { PrimitiveMnemonic } from '../model/program.js';
import { AddressingMode, PARAMETER_COUNT, decodeWord, isOpcode, mnemonicForOpcode } from './opcodes.js';

export interface DisassembledEntry {
  offset: number;
  words: number[];
  text: string;
}

/**
 * Render one operand word: `&12` position, `12` immediate, `@12` relative.
 */
export function formatOperand(mode: number, value: number): string {
  switch (mode) {
    case AddressingMode.Position:
      return `&${value}`;
    case AddressingMode.Immediate:
      return `${value}`;
    case AddressingMode.Relative:
      return `@${value}`;
    default:
      return `?${mode}:${value}`;
  }
}

export function formatInstruction(
  mnemonic: PrimitiveMnemonic,
  operands: ReadonlyArray<{ mode: number; value: number }>,
): string {
  if (operands.length === 0) return mnemonic;
  return `${mnemonic} ${operands.map((o) => formatOperand(o.mode, o.value)).join(', ')}`;
}

function isKnownMode(mode: number): boolean {
  return (
    mode === AddressingMode.Position ||
    mode === AddressingMode.Immediate ||
    mode === AddressingMode.Relative
  );
}

/**
 * Linear-sweep disassembly of an image from address 0.
 *
 * A word that does not decode to a known opcode with known modes, or whose operands would run past the end
 * of the image, becomes a one-word `DATA` entry and the sweep continues at the next word.
 */
export function disassemble(words: readonly number[]): DisassembledEntry[] {
  const out: DisassembledEntry[] = [];
  let offset = 0;
  while (offset < words.length) {
    const word = words[offset] ?? 0;
    const decoded = decodeWord(word);
    const opcode = decoded.opcode;
    const mnemonic = isOpcode(opcode) ? mnemonicForOpcode(opcode) : undefined;
    const count = isOpcode(opcode) ? PARAMETER_COUNT[opcode] : 0;
    const modes = decoded.modes.slice(0, count);

    if (
      mnemonic === undefined ||
      offset + count >= words.length ||
      !modes.every(isKnownMode) ||
      // Unused mode digits must be zero for the word to read back as the same instruction.
      decoded.modes.slice(count).some((m) => m !== 0) ||
      Math.trunc(word / 100000) !== 0
    ) {
      out.push({ offset, words: [word], text: `DATA ${word}` });
      offset += 1;
      continue;
    }

    const operandWords = words.slice(offset + 1, offset + 1 + count);
    const operands = operandWords.map((value, i) => ({ mode: modes[i] ?? 0, value }));
    out.push({
      offset,
      words: [word, ...operandWords],
      text: formatInstruction(mnemonic, operands),
    });
    offset += 1 + count;
  }
  return out;
}
