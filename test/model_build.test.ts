import { describe, expect, it } from 'vitest';

import {
  anchor,
  at,
  imm,
  label,
  lbl,
  op,
  pos,
  posAnchor,
  program,
  rel,
  variable,
} from '../src/model/build.js';
import { MNEMONIC_ARITY, PRIMITIVE_MNEMONICS, isPrimitiveMnemonic } from '../src/model/program.js';

describe('program builders', () => {
  it('builds every operand form', () => {
    expect(imm(-12)).toEqual({ kind: 'Immediate', value: -12 });
    expect(pos('a')).toEqual({ kind: 'Position', name: 'a' });
    expect(rel('b')).toEqual({ kind: 'Relative', name: 'b' });
    expect(label('c')).toEqual({ kind: 'Label', name: 'c' });
    expect(anchor('d')).toEqual({ kind: 'ImmediateAnchor', name: 'd', initial: 0 });
    expect(anchor('d', 7)).toEqual({ kind: 'ImmediateAnchor', name: 'd', initial: 7 });
    expect(posAnchor('e', -3)).toEqual({ kind: 'PositionAnchor', name: 'e', initial: -3 });
  });

  it('builds instructions and pseudo-instructions', () => {
    expect(op('ADD', imm(1), imm(2), pos('x'))).toEqual({
      kind: 'Op',
      mnemonic: 'ADD',
      operands: [imm(1), imm(2), pos('x')],
    });
    expect(lbl('top')).toEqual({ kind: 'Label', name: 'top' });
    expect(variable('v')).toEqual({ kind: 'Var', name: 'v' });
    expect(variable('v', 5)).toEqual({ kind: 'Var', name: 'v', initial: 5 });
  });

  it('attaches spans without mutating the node', () => {
    const node = op('HALT');
    const withSpan = at(node, { file: 'main.llir', start: { line: 2, column: 1 } });
    expect(withSpan.span).toEqual({ file: 'main.llir', start: { line: 2, column: 1 } });
    expect(node.span).toBeUndefined();
  });

  it('defaults the program file name', () => {
    expect(program([]).file).toBe('<program>');
    expect(program([], 'x.llir').file).toBe('x.llir');
  });
});

describe('mnemonic tables', () => {
  it('separates primitive from derived mnemonics', () => {
    expect(PRIMITIVE_MNEMONICS.every(isPrimitiveMnemonic)).toBe(true);
    expect(isPrimitiveMnemonic('COPY')).toBe(false);
    expect(isPrimitiveMnemonic('JUMP')).toBe(false);
    expect(isPrimitiveMnemonic('IADD')).toBe(false);
    expect(isPrimitiveMnemonic('IMUL')).toBe(false);
  });

  it('gives derived mnemonics their surface arity', () => {
    expect(MNEMONIC_ARITY.COPY).toBe(2);
    expect(MNEMONIC_ARITY.JUMP).toBe(1);
    expect(MNEMONIC_ARITY.IADD).toBe(2);
    expect(MNEMONIC_ARITY.HALT).toBe(0);
  });
});
