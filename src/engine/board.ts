import { SolverConfigError } from "./errors";
import { randomInt, type Rng } from "./rng";

// Index set with O(1) add/remove/random pick. Swap-with-last on removal.
interface Bucket {
  items: Int32Array;
  indexOf: Int32Array; // -1 when absent
  size: number;
}

function createBucket(capacity: number): Bucket {
  return {
    items: new Int32Array(capacity),
    indexOf: new Int32Array(capacity).fill(-1),
    size: 0,
  };
}

function addToBucket(bucket: Bucket, value: number): void {
  if (bucket.indexOf[value] !== -1) return;
  bucket.indexOf[value] = bucket.size;
  bucket.items[bucket.size] = value;
  bucket.size++;
}

function removeFromBucket(bucket: Bucket, value: number): void {
  const idx = bucket.indexOf[value];
  if (idx === -1) return;

  const lastIndex = bucket.size - 1;
  const last = bucket.items[lastIndex];
  bucket.items[idx] = last;
  bucket.indexOf[last] = idx;
  bucket.indexOf[value] = -1;
  bucket.size = lastIndex;
}

function pickRandomFromBucket(bucket: Bucket, rng: Rng): number {
  return bucket.items[randomInt(rng, bucket.size)];
}

export function assertBoardSize(n: number): void {
  if (!Number.isInteger(n) || n <= 0) {
    throw new SolverConfigError("n", `Board size must be a positive integer, got ${n}.`);
  }
}

/**
 * One queen per row plus occupancy counters for columns and both diagonal
 * directions. Every line also keeps the XOR of the rows on it, so a line
 * holding a single queen names that queen without a reverse index.
 *
 * Diagonal ids: major = row - col + (n - 1), minor = row + col.
 */
export class BoardState {
  readonly size: number;
  private readonly assignment: Int32Array; // -1 = row not placed yet
  private readonly cols: Int32Array;
  private readonly colXor: Int32Array;
  private readonly major: Int32Array;
  private readonly majorXor: Int32Array;
  private readonly minor: Int32Array;
  private readonly minorXor: Int32Array;
  private readonly conflicted: Bucket;
  private readonly emptyCols: Bucket;
  private placedCount = 0;

  private constructor(n: number) {
    assertBoardSize(n);
    const diagonals = 2 * n - 1;
    this.size = n;
    this.assignment = new Int32Array(n).fill(-1);
    this.cols = new Int32Array(n);
    this.colXor = new Int32Array(n);
    this.major = new Int32Array(diagonals);
    this.majorXor = new Int32Array(diagonals);
    this.minor = new Int32Array(diagonals);
    this.minorXor = new Int32Array(diagonals);
    this.conflicted = createBucket(n);
    this.emptyCols = createBucket(n);
    for (let c = 0; c < n; c++) addToBucket(this.emptyCols, c);
  }

  /** Board with no queens; fill it row by row with `placeQueen`. */
  static empty(n: number): BoardState {
    return new BoardState(n);
  }

  static fromAssignment(assignment: ArrayLike<number>): BoardState {
    const board = new BoardState(assignment.length);
    for (let row = 0; row < assignment.length; row++) {
      board.placeQueen(row, assignment[row]);
    }
    return board;
  }

  get placed(): number {
    return this.placedCount;
  }

  get conflictedCount(): number {
    return this.conflicted.size;
  }

  get emptyColumnCount(): number {
    return this.emptyCols.size;
  }

  columnOf(row: number): number {
    return this.assignment[row];
  }

  columnCount(col: number): number {
    return this.cols[col];
  }

  majorCount(row: number, col: number): number {
    return this.major[row - col + this.size - 1];
  }

  minorCount(row: number, col: number): number {
    return this.minor[row + col];
  }

  // Other queens attacking row's queen if it stood at `col`. A different
  // column in the same row never shares either diagonal with the current
  // square, so the self term is all-or-nothing.
  conflictCount(row: number, col: number): number {
    const self = this.assignment[row] === col ? 1 : 0;
    return (
      this.cols[col] - self +
      (this.major[row - col + this.size - 1] - self) +
      (this.minor[row + col] - self)
    );
  }

  queenConflicts(row: number): number {
    const col = this.assignment[row];
    return col === -1 ? 0 : this.conflictCount(row, col);
  }

  /** Number of attacking pairs. O(n). */
  totalConflicts(): number {
    let pairs = 0;
    for (const counts of [this.cols, this.major, this.minor]) {
      for (let i = 0; i < counts.length; i++) {
        const k = counts[i];
        if (k > 1) pairs += (k * (k - 1)) / 2;
      }
    }
    return pairs;
  }

  conflictedRows(): number[] {
    return Array.from(this.conflicted.items.subarray(0, this.conflicted.size));
  }

  isConflicted(row: number): boolean {
    return this.conflicted.indexOf[row] !== -1;
  }

  randomConflictedRow(rng: Rng): number {
    return pickRandomFromBucket(this.conflicted, rng);
  }

  emptyColumnAt(index: number): number {
    return this.emptyCols.items[index];
  }

  randomEmptyColumn(rng: Rng): number {
    return pickRandomFromBucket(this.emptyCols, rng);
  }

  isSolution(): boolean {
    return this.placedCount === this.size && this.conflicted.size === 0;
  }

  snapshot(): number[] {
    return Array.from(this.assignment);
  }

  placeQueen(row: number, col: number): void {
    if (row < 0 || row >= this.size || this.assignment[row] !== -1) {
      throw new RangeError(`Row ${row} is out of range or already placed.`);
    }
    this.checkColumn(col);
    this.addQueen(row, col);
    this.placedCount++;
  }

  moveQueen(row: number, newCol: number): void {
    const oldCol = this.assignment[row];
    if (oldCol === -1) throw new RangeError(`Row ${row} has no queen to move.`);
    this.checkColumn(newCol);
    if (newCol === oldCol) return;
    this.removeQueen(row);
    this.addQueen(row, newCol);
  }

  private checkColumn(col: number): void {
    if (!Number.isInteger(col) || col < 0 || col >= this.size) {
      throw new RangeError(`Column ${col} is outside [0, ${this.size}).`);
    }
  }

  private addQueen(row: number, col: number): void {
    this.assignment[row] = col;
    if (this.cols[col] === 0) removeFromBucket(this.emptyCols, col);
    this.enter(this.cols, this.colXor, col, row);
    this.enter(this.major, this.majorXor, row - col + this.size - 1, row);
    this.enter(this.minor, this.minorXor, row + col, row);
    this.refresh(row);
  }

  // Two distinct queens share at most one line, so re-checking a remaining
  // occupant mid-removal already sees its final counts.
  private removeQueen(row: number): void {
    const col = this.assignment[row];
    this.leave(this.cols, this.colXor, col, row);
    this.leave(this.major, this.majorXor, row - col + this.size - 1, row);
    this.leave(this.minor, this.minorXor, row + col, row);
    if (this.cols[col] === 0) addToBucket(this.emptyCols, col);
  }

  private enter(counts: Int32Array, xors: Int32Array, line: number, row: number): void {
    if (counts[line] === 1) addToBucket(this.conflicted, xors[line]);
    counts[line]++;
    xors[line] ^= row;
  }

  private leave(counts: Int32Array, xors: Int32Array, line: number, row: number): void {
    counts[line]--;
    xors[line] ^= row;
    if (counts[line] === 1) this.refresh(xors[line]);
  }

  private refresh(row: number): void {
    if (this.queenConflicts(row) > 0) addToBucket(this.conflicted, row);
    else removeFromBucket(this.conflicted, row);
  }
}
