import { BoardState } from "./board";
import { pickRandom, randomInt, type Rng } from "./rng";
import { DEFAULT_CONFIG, type InitStrategy } from "./types";

export function randomAssignment(n: number, rng: Rng): number[] {
  const assignment = new Array<number>(n);
  for (let row = 0; row < n; row++) assignment[row] = randomInt(rng, n);
  return assignment;
}

export function randomInit(n: number, rng: Rng): BoardState {
  return BoardState.fromAssignment(randomAssignment(n, rng));
}

/**
 * Row-by-row placement at a minimum-conflict column among the queens placed
 * so far, ties broken at random.
 *
 * Boards no wider than `sampleSize` get every column evaluated. Wider boards
 * draw `sampleSize` candidates per row, from the empty columns while any are
 * left: an occupied column costs at least one conflict, so a zero-conflict
 * square can only be found there. Total work stays O(n * sampleSize).
 */
export function greedyInit(
  n: number,
  rng: Rng,
  sampleSize: number = DEFAULT_CONFIG.greedySampleSize,
): BoardState {
  const board = BoardState.empty(n);
  const exhaustive = n <= sampleSize;
  const seen = new Set<number>();
  const best: number[] = [];

  for (let row = 0; row < n; row++) {
    let bestCost = Number.POSITIVE_INFINITY;
    best.length = 0;
    seen.clear();

    const consider = (col: number): void => {
      if (seen.has(col)) return;
      seen.add(col);
      const cost = board.conflictCount(row, col);
      if (cost < bestCost) {
        bestCost = cost;
        best.length = 0;
        best.push(col);
      } else if (cost === bestCost) {
        best.push(col);
      }
    };

    if (exhaustive) {
      for (let col = 0; col < n; col++) consider(col);
    } else {
      for (let i = 0; i < sampleSize; i++) {
        consider(board.emptyColumnCount > 0 ? board.randomEmptyColumn(rng) : randomInt(rng, n));
      }
    }

    board.placeQueen(row, pickRandom(best, rng));
  }

  return board;
}

export function initializeBoard(
  n: number,
  strategy: InitStrategy,
  rng: Rng,
  greedySampleSize: number = DEFAULT_CONFIG.greedySampleSize,
): BoardState {
  switch (strategy) {
    case "random":
      return randomInit(n, rng);
    case "greedy":
      return greedyInit(n, rng, greedySampleSize);
  }
}
