// ─── BoardState tests ───────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  BoardState,
  SolverConfigError,
  createRng,
  randomAssignment,
  randomInt,
  conflictedRows,
  countAttackers,
} from "../src/engine/index";

function sorted(rows: number[]): number[] {
  return [...rows].sort((a, b) => a - b);
}

function expectCountersCover(board: BoardState): void {
  for (let row = 0; row < board.size; row++) {
    const col = board.columnOf(row);
    expect(board.columnCount(col)).toBeGreaterThanOrEqual(1);
    expect(board.majorCount(row, col)).toBeGreaterThanOrEqual(1);
    expect(board.minorCount(row, col)).toBeGreaterThanOrEqual(1);
  }
}

// ─── Construction ───────────────────────────────────────────────────────────

describe("BoardState construction", () => {
  it("recognises a solution", () => {
    const board = BoardState.fromAssignment([1, 3, 0, 2]);
    expect(board.isSolution()).toBe(true);
    expect(board.conflictedRows()).toEqual([]);
    expect(board.emptyColumnCount).toBe(0);
    expect(board.totalConflicts()).toBe(0);
  });

  it("flags every queen on a shared diagonal", () => {
    const board = BoardState.fromAssignment([0, 1, 2, 3]);
    expect(board.isSolution()).toBe(false);
    expect(sorted(board.conflictedRows())).toEqual([0, 1, 2, 3]);
    // four queens on one major diagonal = 6 attacking pairs
    expect(board.totalConflicts()).toBe(6);
  });

  it("treats a single queen as solved", () => {
    const board = BoardState.fromAssignment([0]);
    expect(board.isSolution()).toBe(true);
    expect(board.conflictCount(0, 0)).toBe(0);
  });

  it("tracks empty columns", () => {
    const board = BoardState.fromAssignment([0, 0, 2, 3]);
    expect(board.emptyColumnCount).toBe(1);
    expect(board.emptyColumnAt(0)).toBe(1);
    expect(board.randomEmptyColumn(createRng(1))).toBe(1);
  });

  it("rejects non-positive or fractional sizes", () => {
    expect(() => BoardState.empty(0)).toThrow(SolverConfigError);
    expect(() => BoardState.empty(-3)).toThrow(SolverConfigError);
    expect(() => BoardState.empty(2.5)).toThrow(SolverConfigError);
    expect(() => BoardState.fromAssignment([])).toThrow(SolverConfigError);
  });

  it("is not a solution until every row is placed", () => {
    const board = BoardState.empty(4);
    board.placeQueen(0, 1);
    board.placeQueen(1, 3);
    board.placeQueen(2, 0);
    expect(board.conflictedCount).toBe(0);
    expect(board.isSolution()).toBe(false);
    board.placeQueen(3, 2);
    expect(board.isSolution()).toBe(true);
  });

  it("refuses to place a row twice or off the board", () => {
    const board = BoardState.empty(4);
    board.placeQueen(0, 1);
    expect(() => board.placeQueen(0, 2)).toThrow(RangeError);
    expect(() => board.placeQueen(4, 0)).toThrow(RangeError);
    expect(() => board.placeQueen(1, 4)).toThrow(RangeError);
  });
});

// ─── conflictCount ──────────────────────────────────────────────────────────

describe("conflictCount", () => {
  it("subtracts the queen itself only at its current square", () => {
    const board = BoardState.fromAssignment([0, 1, 2, 3]);
    // current square: column 0 alone, major diagonal holds all four, minor 0 alone
    expect(board.conflictCount(0, 0)).toBe(3);
    // (0,1): column 1 has row 1; both diagonals empty
    expect(board.conflictCount(0, 1)).toBe(1);
    // (0,2): column 2 has row 2; minor diagonal 2 has row 1
    expect(board.conflictCount(0, 2)).toBe(2);
    expect(board.conflictCount(0, 3)).toBe(1);
  });

  it("matches a brute-force recount on random boards", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const n = 12;
      const assignment = randomAssignment(n, createRng(seed));
      const board = BoardState.fromAssignment(assignment);
      for (let row = 0; row < n; row++) {
        for (let col = 0; col < n; col++) {
          expect(board.conflictCount(row, col)).toBe(countAttackers(assignment, row, col));
        }
      }
    }
  });
});

// ─── moveQueen ──────────────────────────────────────────────────────────────

describe("moveQueen", () => {
  it("updates the assignment and the conflicted rows", () => {
    const board = BoardState.fromAssignment([0, 1, 2, 3]);
    board.moveQueen(1, 3);
    board.moveQueen(3, 2);
    board.moveQueen(2, 0);
    board.moveQueen(0, 1);
    expect(board.snapshot()).toEqual([1, 3, 0, 2]);
    expect(board.isSolution()).toBe(true);
    expect(board.emptyColumnCount).toBe(0);
  });

  it("un-flags a queen whose only attacker leaves", () => {
    // rows 2 and 3 share column 0
    const board = BoardState.fromAssignment([1, 3, 0, 0]);
    expect(sorted(board.conflictedRows())).toEqual([2, 3]);
    board.moveQueen(3, 2);
    expect(board.conflictedRows()).toEqual([]);
    expect(board.isConflicted(2)).toBe(false);
  });

  it("flags the previous sole occupant of a line the queen joins", () => {
    const board = BoardState.fromAssignment([1, 3, 0, 2]);
    board.moveQueen(3, 1);
    // row 3 now shares column 1 with row 0
    expect(sorted(board.conflictedRows())).toEqual(sorted(conflictedRows(board.snapshot())));
    expect(board.isConflicted(0)).toBe(true);
    expect(board.isConflicted(3)).toBe(true);
  });

  it("is a no-op for the current column", () => {
    const board = BoardState.fromAssignment([0, 1, 2, 3]);
    board.moveQueen(2, 2);
    expect(board.snapshot()).toEqual([0, 1, 2, 3]);
    expect(board.conflictCount(0, 0)).toBe(3);
  });

  it("rejects columns off the board", () => {
    const board = BoardState.fromAssignment([1, 3, 0, 2]);
    expect(() => board.moveQueen(0, 4)).toThrow(RangeError);
    expect(() => board.moveQueen(0, -1)).toThrow(RangeError);
    expect(board.snapshot()).toEqual([1, 3, 0, 2]);
  });

  it("keeps counters and conflicted rows consistent over random moves", () => {
    for (const seed of [10, 20, 30]) {
      const rng = createRng(seed);
      const n = 16;
      const board = BoardState.fromAssignment(randomAssignment(n, rng));
      for (let step = 0; step < 300; step++) {
        board.moveQueen(randomInt(rng, n), randomInt(rng, n));
        const assignment = board.snapshot();
        expect(sorted(board.conflictedRows())).toEqual(conflictedRows(assignment));
        expectCountersCover(board);
      }
      const assignment = board.snapshot();
      for (let row = 0; row < n; row++) {
        for (let col = 0; col < n; col++) {
          expect(board.conflictCount(row, col)).toBe(countAttackers(assignment, row, col));
        }
      }
    }
  });

  it("picks conflicted rows uniformly from the tracked set", () => {
    const board = BoardState.fromAssignment([1, 3, 0, 0]);
    const rng = createRng(8);
    const seen = new Set<number>();
    for (let i = 0; i < 50; i++) seen.add(board.randomConflictedRow(rng));
    expect(sorted([...seen])).toEqual([2, 3]);
  });
});
