export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';
export { compareDiagnostics, formatDiagnostic } from './diagnostics/format.js';

export type {
  AnchorOperand,
  DerivedMnemonic,
  Identifier,
  ImmediateAnchorOperand,
  ImmediateOperand,
  InstructionNode,
  LabelNode,
  LabelOperand,
  Mnemonic,
  OpNode,
  Operand,
  PositionAnchorOperand,
  PositionOperand,
  PrimitiveInstructionNode,
  PrimitiveMnemonic,
  PrimitiveProgram,
  Program,
  ReferenceOperand,
  RelativeOperand,
  SourcePosition,
  SourceSpan,
  VarNode,
} from './model/program.js';
export { MNEMONIC_ARITY, PRIMITIVE_MNEMONICS, isPrimitiveMnemonic } from './model/program.js';
export * from './model/build.js';

export { checkProgram } from './semantics/check.js';
export type { AnchorSlots, Layout, OperandInfo } from './semantics/layout.js';
export { classifyOperand, imageSize, layoutInstruction, layoutProgram } from './semantics/layout.js';
export type { ResolvedInstruction, ResolvedOperand, SymbolTable } from './semantics/symbols.js';
export { buildSymbolTable, resolveProgram } from './semantics/symbols.js';
export { desugarProgram } from './lowering/desugar.js';
export { emitProgram } from './lowering/emit.js';

export type { AssembledProgram } from './assemble.js';
export { assembleProgram } from './assemble.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
export { compile, withDefaults } from './compile.js';

export type * from './formats/types.js';
export { defaultFormatWriters } from './formats/index.js';
export { readImage } from './formats/readImage.js';

export type { DecodedWord } from './machine/opcodes.js';
export {
  AddressingMode,
  MNEMONIC_OPCODE,
  Opcode,
  PARAMETER_COUNT,
  decodeWord,
  encodeWord,
  isOpcode,
  mnemonicForOpcode,
} from './machine/opcodes.js';
export type { StorageFactory, TapeStorage } from './machine/storage.js';
export {
  DEFAULT_GROWABLE_LIMIT,
  FixedTape,
  GrowableTape,
  SparseTape,
  fixedStorage,
  growableStorage,
  sparseStorage,
} from './machine/storage.js';
export type { FaultInterrupt, Interrupt, MachineOptions, MachineRun } from './machine/vm.js';
export { VirtualMachine, isFault, runMachine } from './machine/vm.js';
export type { DisassembledEntry } from './machine/disassemble.js';
export { disassemble, formatInstruction, formatOperand } from './machine/disassemble.js';
