import { SolverConfigError } from "./errors";
import { solve } from "./solver";
import { resolveSeed } from "./rng";
import type { SolveRequest, SolveResponse } from "./types";

export interface RestartRequest extends SolveRequest {
  attempts?: number;
}

export interface AttemptRecord {
  seed: number;
  succeeded: boolean;
  stepsTaken: number;
}

export interface RestartResult {
  response: SolveResponse;    // first success, else the last failure
  attempts: AttemptRecord[];
  successfulAttempt: number | null; // 1-based
}

export const DEFAULT_ATTEMPTS = 10;

/**
 * Independent solves with seeds seed, seed + 1, ... until one succeeds.
 * Each attempt builds its own board and PRNG.
 */
export function solveWithRestarts(request: RestartRequest): RestartResult {
  const { attempts: attemptCount = DEFAULT_ATTEMPTS, ...solveRequest } = request;
  if (!Number.isSafeInteger(attemptCount) || attemptCount < 1) {
    throw new SolverConfigError("attempts", `attempts must be an integer >= 1, got ${attemptCount}.`);
  }

  const baseSeed = resolveSeed(solveRequest.seed);
  const lastSeed = baseSeed + attemptCount - 1;
  if (!Number.isSafeInteger(baseSeed) || !Number.isSafeInteger(lastSeed)) {
    throw new SolverConfigError(
      "seed",
      `seed must be an integer with seed + attempts - 1 <= ${Number.MAX_SAFE_INTEGER}, got ${baseSeed}.`,
    );
  }

  const attempts: AttemptRecord[] = [];
  const attempt = (i: number): SolveResponse => {
    const response = solve({ ...solveRequest, seed: baseSeed + i });
    attempts.push({
      seed: response.seed,
      succeeded: response.succeeded,
      stepsTaken: response.stepsTaken,
    });
    return response;
  };

  let response = attempt(0);
  for (let i = 1; !response.succeeded && i < attemptCount; i++) response = attempt(i);

  return {
    response,
    attempts,
    successfulAttempt: response.succeeded ? attempts.length : null,
  };
}
