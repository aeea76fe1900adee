import type {
  InstructionNode,
  OpNode,
  Operand,
  PrimitiveInstructionNode,
  PrimitiveMnemonic,
  PrimitiveProgram,
  Program,
} from '../model/program.js';
import { isPrimitiveMnemonic } from '../model/program.js';
import { imm, pos } from '../model/build.js';

function primitive(
  mnemonic: PrimitiveMnemonic,
  operands: Operand[],
  from: OpNode,
): OpNode<PrimitiveMnemonic> {
  return from.span ? { kind: 'Op', mnemonic, operands, span: from.span } : { kind: 'Op', mnemonic, operands };
}

/**
 * The store target of an in-place op.
 *
 * An immediate anchor holds the running value in its own word, so the result is stored back through a
 * position reference to the anchor. Position and relative references store to where they read from.
 */
function inPlaceTarget(dest: Operand): Operand {
  return dest.kind === 'ImmediateAnchor' ? pos(dest.name) : dest;
}

function rewrite(node: InstructionNode): PrimitiveInstructionNode {
  if (node.kind !== 'Op') return node;
  const { mnemonic, operands } = node;
  const [a, b] = operands;

  switch (mnemonic) {
    case 'COPY':
      // COPY src dest
      if (a && b) return primitive('ADD', [a, imm(0), b], node);
      break;
    case 'JUMP':
      if (a) return primitive('JIT', [imm(1), a], node);
      break;
    case 'IADD':
      if (a && b) return primitive('ADD', [a, b, inPlaceTarget(a)], node);
      break;
    case 'IMUL':
      if (a && b) return primitive('MUL', [a, b, inPlaceTarget(a)], node);
      break;
    default:
      if (isPrimitiveMnemonic(mnemonic)) return { ...node, mnemonic };
  }
  // Arity is enforced by checkProgram before this pass runs.
  throw new Error(`Cannot rewrite ${mnemonic} with ${operands.length} operand(s).`);
}

/**
 * Rewrite derived instructions (`COPY`, `JUMP`, `IADD`, `IMUL`) into primitive ones.
 *
 * Instruction order and count are preserved, so indices into the input program remain valid for the output.
 * Layout, symbol resolution and emission only ever see the result.
 */
export function desugarProgram(program: Program): PrimitiveProgram {
  return { file: program.file, instructions: program.instructions.map(rewrite) };
}
