import type { SolverConfig } from "./types";

export type ConfigField = "n" | "attempts" | keyof SolverConfig;

// Bad solve input. Thrown before any work is done.
export class SolverConfigError extends Error {
  readonly field: ConfigField;

  constructor(field: ConfigField, message: string) {
    super(message);
    this.name = "SolverConfigError";
    this.field = field;
  }
}

// The incremental counters claimed a solution the validator rejects.
export class SolverInvariantError extends Error {
  readonly assignment: number[];

  constructor(message: string, assignment: number[]) {
    super(message);
    this.name = "SolverInvariantError";
    this.assignment = assignment;
  }
}
