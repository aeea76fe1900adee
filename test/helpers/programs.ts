import {
  anchor,
  imm,
  label,
  lbl,
  op,
  pos,
  program,
  variable,
} from '../../src/model/build.js';
import type { Program } from '../../src/model/program.js';

/** Reads a value, multiplies it by 10 in place inside the `IMUL` anchor word, outputs it. */
export function scaleByTen(): Program {
  return program([op('IN', pos('a')), op('IMUL', anchor('a'), imm(10)), op('OUT', pos('a'))]);
}

/**
 * Reads n, outputs n!.
 *
 * The loop condition lives in the `JIF` instruction's own anchor word (`#c`), written by `LESS`.
 */
export function factorial(): Program {
  return program([
    op('IN', pos('n')),
    op('COPY', imm(1), pos('acc')),
    lbl('loop'),
    op('IMUL', pos('acc'), pos('i')),
    op('IADD', pos('i'), imm(1)),
    op('LESS', pos('n'), pos('i'), pos('c')),
    op('JIF', anchor('c'), label('loop')),
    op('OUT', pos('acc')),
    op('HALT'),
    variable('n'),
    variable('acc'),
    variable('i', 1),
  ]);
}

export const FACTORIAL_IMAGE = [
  3, 24, 1101, 1, 0, 25, 2, 25, 26, 25, 1001, 26, 1, 26, 7, 24, 26, 19, 1106, 0, 6, 4, 25, 99, 0, 0, 1,
];

/** Jumps over a dead `HALT` to live code after a label. */
export function skipDeadHalt(): Program {
  return program([
    op('JUMP', label('continue')),
    op('HALT'),
    lbl('continue'),
    op('OUT', imm(42)),
    op('HALT'),
  ]);
}

export const SKIP_DEAD_HALT_IMAGE = [1105, 1, 4, 99, 104, 42, 99];
