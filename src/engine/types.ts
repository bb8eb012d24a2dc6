export type InitStrategy = "random" | "greedy";

export interface SolverConfig {
  maxSteps: number;        // repair budget, > 0
  seed?: number;           // integer; drawn from the clock when absent
  init: InitStrategy;
  greedySampleSize: number; // candidate columns per row during greedy placement
  // Opt-in sampled repair for very large boards; off = evaluate every column
  sampledRepair: boolean;
  sampleThreshold: number;  // sampled repair only kicks in for n >= this
  emptyColumnSamples: number;
  randomColumnSamples: number;
}

export interface SolveRequest extends Partial<SolverConfig> {
  n: number;
}

export interface SolveResponse {
  assignment: number[] | null; // assignment[row] = col; null when no solution was found
  stepsTaken: number;
  succeeded: boolean;
  seed: number;
  initialConflictedRows: number; // rows under attack after initialization, not attacking pairs
}

/** Default config */
export const DEFAULT_CONFIG: SolverConfig = {
  maxSteps: 100_000,
  init: "greedy",
  greedySampleSize: 50,
  sampledRepair: false,
  sampleThreshold: 5000,
  emptyColumnSamples: 20,
  randomColumnSamples: 10,
};
