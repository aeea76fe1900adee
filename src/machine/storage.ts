/**
 * Indexed integer storage backing a machine tape.
 *
 * Unwritten addresses read as 0. Callers only pass integer addresses in `[0, limit)`; the machine checks
 * this before every access and reports a memory fault otherwise.
 */
export interface TapeStorage {
  /** Exclusive upper bound on addresses. */
  readonly limit: number;
  get(address: number): number;
  set(address: number, value: number): void;
}

/**
 * Builds a fresh tape holding `image` at address 0. Called on construction and on every reset.
 */
export type StorageFactory = (image: readonly number[]) => TapeStorage;

/** Default cap for {@link GrowableTape}: 16M words. */
export const DEFAULT_GROWABLE_LIMIT = 1 << 24;

/**
 * Dense array that grows on write, up to `limit` words.
 */
export class GrowableTape implements TapeStorage {
  private readonly cells: number[];

  constructor(
    image: readonly number[] = [],
    readonly limit: number = DEFAULT_GROWABLE_LIMIT,
  ) {
    this.cells = [...image];
  }

  get(address: number): number {
    return this.cells[address] ?? 0;
  }

  set(address: number, value: number): void {
    const length = this.cells.length;
    if (address > length) {
      this.cells.length = address;
      this.cells.fill(0, length);
    }
    this.cells[address] = value;
  }
}

/**
 * Map-backed tape. Only written cells take space, so any safe-integer address is usable.
 */
export class SparseTape implements TapeStorage {
  readonly limit = Number.MAX_SAFE_INTEGER;
  private readonly cells = new Map<number, number>();

  constructor(image: readonly number[] = []) {
    image.forEach((word, address) => {
      if (word !== 0) this.cells.set(address, word);
    });
  }

  get(address: number): number {
    return this.cells.get(address) ?? 0;
  }

  set(address: number, value: number): void {
    if (value === 0) {
      this.cells.delete(address);
    } else {
      this.cells.set(address, value);
    }
  }
}

/**
 * Fixed-size tape. Addresses at or beyond `size` fault.
 */
export class FixedTape implements TapeStorage {
  readonly limit: number;
  private readonly cells: Float64Array;

  constructor(size: number, image: readonly number[] = []) {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`Tape size must be a non-negative integer (got ${size}).`);
    }
    if (image.length > size) {
      throw new RangeError(`Image of ${image.length} words does not fit a ${size}-word tape.`);
    }
    this.limit = size;
    this.cells = new Float64Array(size);
    this.cells.set(image);
  }

  get(address: number): number {
    return this.cells[address] ?? 0;
  }

  set(address: number, value: number): void {
    this.cells[address] = value;
  }
}

export const growableStorage: StorageFactory = (image) => new GrowableTape(image);

export const sparseStorage: StorageFactory = (image) => new SparseTape(image);

export function fixedStorage(size: number): StorageFactory {
  return (image) => new FixedTape(size, image);
}
