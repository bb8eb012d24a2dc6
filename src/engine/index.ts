export { BoardState, assertBoardSize } from "./board";
export { createRng, randomInt, pickRandom, resolveSeed } from "./rng";
export type { Rng } from "./rng";
export { SolverConfigError, SolverInvariantError } from "./errors";
export type { ConfigField } from "./errors";
export type {
  InitStrategy,
  SolverConfig,
  SolveRequest,
  SolveResponse,
} from "./types";
export { DEFAULT_CONFIG } from "./types";
export {
  randomAssignment,
  randomInit,
  greedyInit,
  initializeBoard,
} from "./init";
export {
  solve,
  minConflicts,
  repairStep,
  repairOptionsFor,
  validateRequest,
} from "./solver";
export type {
  RepairMove,
  RepairOptions,
  ResolvedRequest,
} from "./solver";
export { solveWithRestarts, DEFAULT_ATTEMPTS } from "./restarts";
export type {
  AttemptRecord,
  RestartRequest,
  RestartResult,
} from "./restarts";
export { isSolution, conflictedRows, countAttackers } from "./validator";
