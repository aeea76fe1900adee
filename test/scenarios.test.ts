import { describe, expect, it } from 'vitest';

import { compile } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { readImage } from '../src/formats/readImage.js';
import type { ImageArtifact } from '../src/formats/types.js';
import { runMachine, VirtualMachine } from '../src/machine/vm.js';
import { at, imm, label, lbl, op, pos, program, variable } from '../src/model/build.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import type { Program } from '../src/model/program.js';
import { factorial, scaleByTen, skipDeadHalt } from './helpers/programs.js';

function build(p: Program): number[] {
  const res = compile(p, { emitListing: false, emitSymbols: false }, { formats: defaultFormatWriters });
  expect(res.diagnostics).toEqual([]);
  return res.image;
}

describe('assemble and run', () => {
  it('scales its input by ten inside an instruction operand', () => {
    const image = build(scaleByTen());
    expect(image).toEqual([3, 3, 1102, 0, 10, 3, 4, 3]);
    const { outputs, interrupt } = runMachine(image, [-81]);
    expect(outputs).toEqual([-810]);
    expect(interrupt).toEqual({ kind: 'InvalidOpcode', value: 0, position: 8 });
  });

  it('computes factorials with a loop condition held in an anchor', () => {
    const image = build(factorial());
    const run = runMachine(image, [5]);
    expect(run.outputs).toEqual([120]);
    expect(run.interrupt).toEqual({ kind: 'Halt', value: 3 });
    expect(run.machine.peek(19)).toBe(1);

    expect(runMachine(image, [0]).outputs).toEqual([1]);
    expect(runMachine(image, [1]).outputs).toEqual([1]);
    expect(runMachine(image, [3]).outputs).toEqual([6]);
    expect(runMachine(image, [10]).outputs).toEqual([3628800]);
  });

  it('jumps over dead code to a forward label', () => {
    const machine = new VirtualMachine(build(skipDeadHalt()));
    expect(machine.tick()).toBeUndefined();
    expect(machine.position).toBe(4);
    expect(machine.tick()).toEqual({ kind: 'Output', value: 42 });
    expect(machine.tick()).toEqual({ kind: 'Halt', value: 1105 });
    expect(machine.position).toBe(6);
    expect(machine.stepCount).toBe(2);
  });

  it('asks for input when the queue is empty', () => {
    const machine = new VirtualMachine(build(scaleByTen()));
    expect(machine.run()).toEqual({ kind: 'InputRequired' });
    machine.provideInput(7);
    expect(machine.run()).toEqual({ kind: 'InvalidOpcode', value: 0, position: 8 });
    expect(machine.outputs).toEqual([70]);
  });

  it('runs an image loaded from its text artifact', () => {
    const res = compile(skipDeadHalt(), {}, { formats: defaultFormatWriters });
    const artifact = res.artifacts.find((a): a is ImageArtifact => a.kind === 'image');
    const diagnostics: Diagnostic[] = [];
    const words = readImage(artifact?.text ?? '', 'continue.img', diagnostics);
    expect(diagnostics).toEqual([]);
    expect(runMachine(words ?? []).outputs).toEqual([42]);
  });

  it('resolves a forward jump target and a data word declared after use', () => {
    const image = build(
      program([
        op('JUMP', label('end')),
        op('OUT', imm(1)),
        lbl('end'),
        op('OUT', pos('v')),
        op('HALT'),
        variable('v', 9),
      ]),
    );
    expect(image).toEqual([1105, 1, 5, 104, 1, 4, 8, 99, 9]);
    expect(runMachine(image).outputs).toEqual([9]);
  });
});

describe('symbol errors', () => {
  it('reports a duplicate declaration at its source position', () => {
    const res = compile(
      program(
        [
          at(lbl('a'), { file: 'dup.llir', start: { line: 1, column: 1 } }),
          at(variable('a'), { file: 'dup.llir', start: { line: 3, column: 1 } }),
        ],
        'dup.llir',
      ),
      {},
      { formats: defaultFormatWriters },
    );
    expect(res.diagnostics).toEqual([
      {
        id: 'LLIR300',
        severity: 'error',
        message: 'Duplicate anchor "a" (already declared at address 0).',
        file: 'dup.llir',
        line: 3,
        column: 1,
      },
    ]);
    expect(res.image).toEqual([]);
  });

  it('reports an undefined reference', () => {
    const res = compile(program([op('OUT', pos('missing')), op('HALT')]), {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([
      {
        id: 'LLIR301',
        severity: 'error',
        message: 'Undefined symbol "missing" in OUT operand 1.',
        file: '<program>',
      },
    ]);
    expect(res.artifacts).toEqual([]);
  });
});
