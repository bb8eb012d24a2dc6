import { assertBoardSize, BoardState } from "./board";
import { SolverConfigError, SolverInvariantError, type ConfigField } from "./errors";
import { initializeBoard } from "./init";
import { createRng, pickRandom, randomInt, resolveSeed, type Rng } from "./rng";
import { DEFAULT_CONFIG, type SolveRequest, type SolveResponse, type SolverConfig } from "./types";
import { isSolution } from "./validator";

export interface ResolvedRequest extends SolverConfig {
  n: number;
  seed: number;
}

export interface RepairOptions {
  sampled: boolean;
  emptyColumnSamples: number;
  randomColumnSamples: number;
}

export interface RepairMove {
  row: number;
  from: number;
  to: number; // equals `from` when the step was a no-op
}

const EXHAUSTIVE: RepairOptions = {
  sampled: false,
  emptyColumnSamples: 0,
  randomColumnSamples: 0,
};

function requireInteger(field: ConfigField, value: number, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new SolverConfigError(field, `${field} must be an integer >= ${min}, got ${value}.`);
  }
}

export function validateRequest(request: SolveRequest): ResolvedRequest {
  assertBoardSize(request.n);
  if (request.seed !== undefined && !Number.isSafeInteger(request.seed)) {
    throw new SolverConfigError("seed", `seed must be an integer, got ${request.seed}.`);
  }

  const resolved: ResolvedRequest = {
    n: request.n,
    seed: resolveSeed(request.seed),
    maxSteps: request.maxSteps ?? DEFAULT_CONFIG.maxSteps,
    init: request.init ?? DEFAULT_CONFIG.init,
    greedySampleSize: request.greedySampleSize ?? DEFAULT_CONFIG.greedySampleSize,
    sampledRepair: request.sampledRepair ?? DEFAULT_CONFIG.sampledRepair,
    sampleThreshold: request.sampleThreshold ?? DEFAULT_CONFIG.sampleThreshold,
    emptyColumnSamples: request.emptyColumnSamples ?? DEFAULT_CONFIG.emptyColumnSamples,
    randomColumnSamples: request.randomColumnSamples ?? DEFAULT_CONFIG.randomColumnSamples,
  };

  requireInteger("maxSteps", resolved.maxSteps, 1);
  requireInteger("greedySampleSize", resolved.greedySampleSize, 1);
  requireInteger("sampleThreshold", resolved.sampleThreshold, 0);
  requireInteger("emptyColumnSamples", resolved.emptyColumnSamples, 0);
  requireInteger("randomColumnSamples", resolved.randomColumnSamples, 0);
  // With no draws the current column is the only candidate and no queen can move.
  if (resolved.sampledRepair && resolved.emptyColumnSamples + resolved.randomColumnSamples === 0) {
    throw new SolverConfigError(
      "sampledRepair",
      "Sampled repair needs emptyColumnSamples + randomColumnSamples >= 1.",
    );
  }
  if (resolved.init !== "random" && resolved.init !== "greedy") {
    throw new SolverConfigError("init", `Unknown init strategy "${String(resolved.init)}".`);
  }
  return resolved;
}

export function repairOptionsFor(config: ResolvedRequest): RepairOptions {
  if (!config.sampledRepair || config.n < config.sampleThreshold) return EXHAUSTIVE;
  return {
    sampled: true,
    emptyColumnSamples: config.emptyColumnSamples,
    randomColumnSamples: config.randomColumnSamples,
  };
}

// True minimum over all n columns. Empty columns go first: with free
// diagonals they are the zero-conflict squares.
function minConflictColumn(board: BoardState, row: number, rng: Rng): number {
  const best: number[] = [];
  let bestCost = Number.POSITIVE_INFINITY;

  const consider = (col: number): void => {
    const cost = board.conflictCount(row, col);
    if (cost < bestCost) {
      bestCost = cost;
      best.length = 0;
      best.push(col);
    } else if (cost === bestCost) {
      best.push(col);
    }
  };

  for (let i = 0; i < board.emptyColumnCount; i++) consider(board.emptyColumnAt(i));
  for (let col = 0; col < board.size; col++) {
    if (board.columnCount(col) > 0) consider(col);
  }

  return pickRandom(best, rng);
}

// Large-board mode: the current column, a handful of empty columns and a
// handful of uniform columns.
function sampledMinConflictColumn(
  board: BoardState,
  row: number,
  rng: Rng,
  options: RepairOptions,
): number {
  const candidates = new Set<number>([board.columnOf(row)]);
  const emptyDraws = Math.min(options.emptyColumnSamples, board.emptyColumnCount);
  for (let i = 0; i < emptyDraws; i++) candidates.add(board.randomEmptyColumn(rng));
  for (let i = 0; i < options.randomColumnSamples; i++) candidates.add(randomInt(rng, board.size));

  const best: number[] = [];
  let bestCost = Number.POSITIVE_INFINITY;
  for (const col of candidates) {
    const cost = board.conflictCount(row, col);
    if (cost < bestCost) {
      bestCost = cost;
      best.length = 0;
      best.push(col);
    } else if (cost === bestCost) {
      best.push(col);
    }
  }

  return pickRandom(best, rng);
}

/**
 * One MIN-CONFLICTS step: a random conflicted row moves to a random
 * minimum-conflict column. Returns null when nothing is conflicted.
 */
export function repairStep(
  board: BoardState,
  rng: Rng,
  options: RepairOptions = EXHAUSTIVE,
): RepairMove | null {
  if (board.conflictedCount === 0) return null;

  const row = board.randomConflictedRow(rng);
  const from = board.columnOf(row);
  const to = options.sampled
    ? sampledMinConflictColumn(board, row, rng, options)
    : minConflictColumn(board, row, rng);
  board.moveQueen(row, to);
  return { row, from, to };
}

function certify(board: BoardState): number[] {
  const assignment = board.snapshot();
  if (!isSolution(assignment)) {
    throw new SolverInvariantError(
      "Conflict counters reported a solution that fails independent validation.",
      assignment,
    );
  }
  return assignment;
}

/**
 * Runs MIN-CONFLICTS to a conflict-free board or until `maxSteps` steps
 * have been spent. Running out of steps is a normal result
 * (`succeeded: false`); bad input throws SolverConfigError.
 */
export function solve(request: SolveRequest): SolveResponse {
  const config = validateRequest(request);
  const rng = createRng(config.seed);
  const board = initializeBoard(config.n, config.init, rng, config.greedySampleSize);
  const initialConflictedRows = board.conflictedCount;
  const options = repairOptionsFor(config);

  let steps = 0;
  while (!board.isSolution()) {
    if (steps >= config.maxSteps) {
      return {
        assignment: null,
        stepsTaken: config.maxSteps,
        succeeded: false,
        seed: config.seed,
        initialConflictedRows,
      };
    }
    repairStep(board, rng, options);
    steps++;
  }

  return {
    assignment: certify(board),
    stepsTaken: steps,
    succeeded: true,
    seed: config.seed,
    initialConflictedRows,
  };
}

export function minConflicts(
  n: number,
  maxSteps: number = DEFAULT_CONFIG.maxSteps,
  seed?: number,
): SolveResponse {
  return solve({ n, maxSteps, seed });
}
