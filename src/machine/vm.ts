import type { StorageFactory, TapeStorage } from './storage.js';
import { growableStorage } from './storage.js';
import { AddressingMode, Opcode, decodeWord } from './opcodes.js';

/**
 * Why `tick`/`run` handed control back to the caller.
 *
 * `Halt`, `InputRequired` and `Output` are normal. The remaining kinds are faults: the machine state is left
 * exactly as it was before the faulting instruction.
 */
export type Interrupt =
  | { kind: 'Halt'; value: number }
  | { kind: 'InputRequired' }
  | { kind: 'Output'; value: number }
  | { kind: 'InvalidOpcode'; value: number; position: number }
  | { kind: 'InvalidAddressingMode'; mode: number; position: number }
  | { kind: 'MemoryFault'; address: number; position: number }
  | { kind: 'ArithmeticOverflow'; value: number; position: number };

export type FaultInterrupt = Extract<
  Interrupt,
  { kind: 'InvalidOpcode' | 'InvalidAddressingMode' | 'MemoryFault' | 'ArithmeticOverflow' }
>;

export function isFault(interrupt: Interrupt): interrupt is FaultInterrupt {
  return (
    interrupt.kind === 'InvalidOpcode' ||
    interrupt.kind === 'InvalidAddressingMode' ||
    interrupt.kind === 'MemoryFault' ||
    interrupt.kind === 'ArithmeticOverflow'
  );
}

export interface MachineOptions {
  /** Tape implementation. Defaults to a growable dense tape. */
  storage?: StorageFactory;
  /** Values queued for input instructions before the first tick. */
  input?: readonly number[];
  /**
   * Receives each value output during `run`. When absent, values are recorded in `outputs`.
   */
  onOutput?: (value: number) => void;
}

/** A word read from the tape, or the fault that prevented reading it. */
type Fetched = number | FaultInterrupt;

function assertInteger(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Machine values must be safe integers (got ${value}).`);
  }
}

/**
 * Tape machine executing a flat integer image.
 *
 * Instructions are an opcode word followed by operand words. Each operand is read in position, immediate or
 * relative mode as selected by the decimal mode digits of the opcode word. Execution is cooperative: `tick`
 * runs one instruction and reports output, input starvation, halt and faults as an {@link Interrupt}.
 */
export class VirtualMachine {
  readonly outputs: number[] = [];

  private tape: TapeStorage;
  private pc = 0;
  private rb = 0;
  private steps = 0;
  private readonly image: readonly number[];
  private readonly pendingInput: number[] = [];
  private readonly createStorage: StorageFactory;
  private readonly onOutput: ((value: number) => void) | undefined;

  constructor(image: readonly number[], options: MachineOptions = {}) {
    image.forEach(assertInteger);
    this.image = Object.freeze([...image]);
    this.createStorage = options.storage ?? growableStorage;
    this.onOutput = options.onOutput;
    this.tape = this.createStorage(this.image);
    if (options.input) this.provideInput(...options.input);
  }

  /** Address of the next instruction word. */
  get position(): number {
    return this.pc;
  }

  get relativeBase(): number {
    return this.rb;
  }

  /** Instructions completed since construction or the last reset. */
  get stepCount(): number {
    return this.steps;
  }

  /** Number of queued input values not yet consumed. */
  get pendingInputCount(): number {
    return this.pendingInput.length;
  }

  /**
   * Read a tape cell without executing anything.
   */
  peek(address: number): number {
    if (!this.isAddressable(address)) {
      throw new RangeError(`Address ${address} is outside the tape (limit ${this.tape.limit}).`);
    }
    return this.tape.get(address);
  }

  /**
   * Queue values for subsequent input instructions, consumed in order.
   */
  provideInput(...values: number[]): void {
    values.forEach(assertInteger);
    this.pendingInput.push(...values);
  }

  /**
   * Restore the initial image and clear registers, pending input and recorded output.
   */
  reset(): void {
    this.tape = this.createStorage(this.image);
    this.pc = 0;
    this.rb = 0;
    this.steps = 0;
    this.pendingInput.length = 0;
    this.outputs.length = 0;
  }

  /**
   * Execute exactly one instruction.
   *
   * Returns `undefined` when execution can simply continue. A jump sets `position` to its target; any other
   * completed instruction advances `position` past its operands. `InputRequired` and faults leave `position`
   * unchanged, so ticking again retries the same instruction. `Halt` also leaves it in place.
   */
  tick(): Interrupt | undefined {
    const word = this.read(this.pc);
    if (typeof word !== 'number') return word;
    return this.execute(word);
  }

  /**
   * Tick until halt, input starvation or a fault.
   *
   * Output is forwarded to the `onOutput` sink (or recorded in `outputs`) and execution continues.
   */
  run(): Interrupt {
    for (;;) {
      const interrupt = this.tick();
      if (interrupt === undefined) continue;
      if (interrupt.kind === 'Output') {
        if (this.onOutput) {
          this.onOutput(interrupt.value);
        } else {
          this.outputs.push(interrupt.value);
        }
        continue;
      }
      return interrupt;
    }
  }

  private execute(word: number): Interrupt | undefined {
    const { opcode, modes } = decodeWord(word);
    const [m1, m2, m3] = modes;

    switch (opcode) {
      case Opcode.Add:
        return this.combine(m1, m2, m3, (a, b) => a + b);
      case Opcode.Multiply:
        return this.combine(m1, m2, m3, (a, b) => a * b);
      case Opcode.Input: {
        const target = this.operandAddress(1, m1);
        if (typeof target !== 'number') return target;
        const value = this.pendingInput.shift();
        if (value === undefined) return { kind: 'InputRequired' };
        this.tape.set(target, value);
        this.advance(1);
        return undefined;
      }
      case Opcode.Output: {
        const value = this.load(1, m1);
        if (typeof value !== 'number') return value;
        this.advance(1);
        return { kind: 'Output', value };
      }
      case Opcode.JumpIfNonZero:
        return this.branch(m1, m2, (cond) => cond !== 0);
      case Opcode.JumpIfZero:
        return this.branch(m1, m2, (cond) => cond === 0);
      case Opcode.LessThan:
        return this.combine(m1, m2, m3, (a, b) => (a < b ? 1 : 0));
      case Opcode.Equals:
        return this.combine(m1, m2, m3, (a, b) => (a === b ? 1 : 0));
      case Opcode.AdjustRelativeBase: {
        const offset = this.load(1, m1);
        if (typeof offset !== 'number') return offset;
        const base = this.checked(this.rb + offset);
        if (typeof base !== 'number') return base;
        this.rb = base;
        this.advance(1);
        return undefined;
      }
      case Opcode.Halt:
        return { kind: 'Halt', value: this.tape.limit > 0 ? this.tape.get(0) : 0 };
      default:
        return { kind: 'InvalidOpcode', value: word, position: this.pc };
    }
  }

  /**
   * Three-operand instruction: read operands 1 and 2, store `fn(a, b)` through operand 3.
   *
   * The store target and the result are validated before the tape is touched.
   */
  private combine(
    m1: number,
    m2: number,
    m3: number,
    fn: (a: number, b: number) => number,
  ): FaultInterrupt | undefined {
    const a = this.load(1, m1);
    if (typeof a !== 'number') return a;
    const b = this.load(2, m2);
    if (typeof b !== 'number') return b;
    const target = this.operandAddress(3, m3);
    if (typeof target !== 'number') return target;
    const result = this.checked(fn(a, b));
    if (typeof result !== 'number') return result;
    this.tape.set(target, result);
    this.advance(3);
    return undefined;
  }

  private branch(
    m1: number,
    m2: number,
    taken: (cond: number) => boolean,
  ): FaultInterrupt | undefined {
    const cond = this.load(1, m1);
    if (typeof cond !== 'number') return cond;
    const target = this.load(2, m2);
    if (typeof target !== 'number') return target;
    if (taken(cond)) {
      this.jump(target);
    } else {
      this.advance(2);
    }
    return undefined;
  }

  /**
   * Results must stay safe integers. `-0` is stored as `0`.
   */
  private checked(value: number): Fetched {
    if (!Number.isSafeInteger(value)) {
      return { kind: 'ArithmeticOverflow', value, position: this.pc };
    }
    return value === 0 ? 0 : value;
  }

  private isAddressable(address: number): boolean {
    return Number.isSafeInteger(address) && address >= 0 && address < this.tape.limit;
  }

  private read(address: number): Fetched {
    if (!this.isAddressable(address)) {
      return { kind: 'MemoryFault', address, position: this.pc };
    }
    return this.tape.get(address);
  }

  /**
   * Address referenced by the operand at `pc + offset` in position or relative mode.
   */
  private operandAddress(offset: number, mode: number): Fetched {
    const word = this.read(this.pc + offset);
    if (typeof word !== 'number') return word;
    let address: number;
    switch (mode) {
      case AddressingMode.Position:
        address = word;
        break;
      case AddressingMode.Relative:
        address = this.rb + word;
        break;
      default:
        return { kind: 'InvalidAddressingMode', mode, position: this.pc };
    }
    if (!this.isAddressable(address)) {
      return { kind: 'MemoryFault', address, position: this.pc };
    }
    return address;
  }

  private load(offset: number, mode: number): Fetched {
    if (mode === AddressingMode.Immediate) return this.read(this.pc + offset);
    const address = this.operandAddress(offset, mode);
    if (typeof address !== 'number') return address;
    return this.tape.get(address);
  }

  private advance(parameterCount: number): void {
    this.pc += 1 + parameterCount;
    this.steps += 1;
  }

  private jump(target: number): void {
    this.pc = target;
    this.steps += 1;
  }
}

export interface MachineRun {
  outputs: number[];
  interrupt: Interrupt;
  machine: VirtualMachine;
}

/**
 * Run an image to its first non-output interrupt with the given input, collecting every output.
 */
export function runMachine(
  image: readonly number[],
  input: readonly number[] = [],
  options: Pick<MachineOptions, 'storage'> = {},
): MachineRun {
  const machine = new VirtualMachine(image, { ...options, input });
  const interrupt = machine.run();
  return { outputs: [...machine.outputs], interrupt, machine };
}
