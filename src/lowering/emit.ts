import type { EmittedImage, EmittedTraceEntry } from '../formats/types.js';
import type { ResolvedInstruction } from '../semantics/symbols.js';
import { MNEMONIC_OPCODE, encodeWord } from '../machine/opcodes.js';
import { formatInstruction } from '../machine/disassemble.js';

/**
 * Emit the flat image for a resolved program.
 *
 * Each op becomes its instruction word (`opcode + 100*mode1 + 1000*mode2 + 10000*mode3`) followed by its
 * operand words in declared order; each `VAR` becomes one data word; labels emit nothing.
 *
 * Emission is pure: the same resolved program always yields the same words and trace.
 */
export function emitProgram(resolved: readonly ResolvedInstruction[]): EmittedImage {
  const words: number[] = [];
  const trace: EmittedTraceEntry[] = [];

  for (const item of resolved) {
    const offset = words.length;
    switch (item.kind) {
      case 'label':
        trace.push({ kind: 'label', offset, name: item.name });
        break;
      case 'data':
        words.push(item.value);
        trace.push({ kind: 'data', offset, name: item.name, words: [item.value] });
        break;
      case 'op': {
        const word = encodeWord(
          MNEMONIC_OPCODE[item.mnemonic],
          item.operands.map((o) => o.mode),
        );
        const emitted = [word, ...item.operands.map((o) => o.value)];
        words.push(...emitted);
        trace.push({
          kind: 'instruction',
          offset,
          text: formatInstruction(item.mnemonic, item.operands),
          words: emitted,
        });
        break;
      }
    }
  }

  return { words, trace };
}
