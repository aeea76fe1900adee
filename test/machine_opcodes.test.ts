import { describe, expect, it } from 'vitest';

import {
  AddressingMode,
  MNEMONIC_OPCODE,
  Opcode,
  PARAMETER_COUNT,
  decodeWord,
  encodeWord,
  isOpcode,
  mnemonicForOpcode,
} from '../src/machine/opcodes.js';

describe('opcode table', () => {
  it('uses the image encoding values', () => {
    expect(MNEMONIC_OPCODE).toEqual({
      ADD: 1,
      MUL: 2,
      IN: 3,
      OUT: 4,
      JIT: 5,
      JIF: 6,
      LESS: 7,
      EQ: 8,
      ARB: 9,
      HALT: 99,
    });
  });

  it('knows each opcode parameter count', () => {
    expect(PARAMETER_COUNT[Opcode.Add]).toBe(3);
    expect(PARAMETER_COUNT[Opcode.Input]).toBe(1);
    expect(PARAMETER_COUNT[Opcode.JumpIfZero]).toBe(2);
    expect(PARAMETER_COUNT[Opcode.Halt]).toBe(0);
  });

  it('maps opcodes back to mnemonics', () => {
    expect(isOpcode(99)).toBe(true);
    expect(isOpcode(10)).toBe(false);
    expect(isOpcode(0)).toBe(false);
    expect(mnemonicForOpcode(Opcode.JumpIfZero)).toBe('JIF');
    expect(mnemonicForOpcode(Opcode.AdjustRelativeBase)).toBe('ARB');
  });
});

describe('instruction words', () => {
  it('weights operand modes by 100, 1000 and 10000', () => {
    expect(
      encodeWord(Opcode.Add, [
        AddressingMode.Immediate,
        AddressingMode.Position,
        AddressingMode.Relative,
      ]),
    ).toBe(20101);
    expect(encodeWord(Opcode.JumpIfZero, [AddressingMode.Immediate, AddressingMode.Immediate])).toBe(
      1106,
    );
    expect(encodeWord(Opcode.Halt, [])).toBe(99);
  });

  it('splits a word into opcode and mode digits', () => {
    expect(decodeWord(20101)).toEqual({ opcode: 1, modes: [1, 0, 2] });
    expect(decodeWord(1106)).toEqual({ opcode: 6, modes: [1, 1, 0] });
    expect(decodeWord(99)).toEqual({ opcode: 99, modes: [0, 0, 0] });
  });

  it('never decodes a negative word to a valid opcode', () => {
    expect(isOpcode(decodeWord(-1).opcode)).toBe(false);
    expect(isOpcode(decodeWord(-99).opcode)).toBe(false);
  });
});
