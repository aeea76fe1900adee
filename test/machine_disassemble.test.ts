import { describe, expect, it } from 'vitest';

import { disassemble, formatOperand } from '../src/machine/disassemble.js';
import { FACTORIAL_IMAGE, SKIP_DEAD_HALT_IMAGE } from './helpers/programs.js';

describe('disassemble', () => {
  it('decodes instructions with their operand modes', () => {
    expect(disassemble(SKIP_DEAD_HALT_IMAGE)).toEqual([
      { offset: 0, words: [1105, 1, 4], text: 'JIT 1, 4' },
      { offset: 3, words: [99], text: 'HALT' },
      { offset: 4, words: [104, 42], text: 'OUT 42' },
      { offset: 6, words: [99], text: 'HALT' },
    ]);
  });

  it('renders position, immediate and relative operands', () => {
    expect(formatOperand(0, 5)).toBe('&5');
    expect(formatOperand(1, -5)).toBe('-5');
    expect(formatOperand(2, 5)).toBe('@5');
    expect(formatOperand(7, 5)).toBe('?7:5');
    expect(disassemble([204, 1])).toEqual([{ offset: 0, words: [204, 1], text: 'OUT @1' }]);
  });

  it('falls back to DATA for words that are not instructions', () => {
    expect(disassemble([1, 2])).toEqual([
      { offset: 0, words: [1], text: 'DATA 1' },
      { offset: 1, words: [2], text: 'DATA 2' },
    ]);
    expect(disassemble([301, 0]).map((e) => e.text)).toEqual(['DATA 301', 'DATA 0']);
    expect(disassemble([10099]).map((e) => e.text)).toEqual(['DATA 10099']);
  });

  it('walks the factorial image', () => {
    expect(disassemble(FACTORIAL_IMAGE).map((e) => e.text)).toEqual([
      'IN &24',
      'ADD 1, 0, &25',
      'MUL &25, &26, &25',
      'ADD &26, 1, &26',
      'LESS &24, &26, &19',
      'JIF 0, 6',
      'OUT &25',
      'HALT',
      'DATA 0',
      'DATA 0',
      'DATA 1',
    ]);
  });
});
