/**
 * Error kinds raised by the generator, solver and simulator.
 *
 * Configuration problems and caller bugs fail loudly with one of these classes; an
 * unreachable goal is normally reported as a `null` solver result and only becomes
 * {@link UnreachableGoalError} through `solveMazeOrThrow`.
 */

/** Common base so callers can catch every library failure at once. */
export class MazeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MazeError';
  }
}

/** Invalid dimensions, tuning parameters, positions or registry entries. */
export class ConfigurationError extends MazeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A maze strategy produced a grid whose shape differs from the simulator's configuration. */
export class ShapeMismatchError extends ConfigurationError {
  readonly expected: readonly [number, number];
  readonly actual: readonly [number, number];

  constructor(expected: readonly [number, number], actual: readonly [number, number]) {
    super(
      `Generated maze shape ${actual[0]}x${actual[1]} does not match the configured ` +
        `height x width ${expected[0]}x${expected[1]}`
    );
    this.name = 'ShapeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Action symbol outside the fixed 0..3 set. */
export class InvalidActionError extends MazeError {
  readonly action: unknown;

  constructor(action: unknown) {
    super(`Invalid action ${String(action)}; expected one of 0, 1, 2, 3`);
    this.name = 'InvalidActionError';
    this.action = action;
  }
}

/** `step()` called while no episode is running. */
export class EpisodeStateError extends MazeError {
  constructor(message: string) {
    super(message);
    this.name = 'EpisodeStateError';
  }
}

/** No path joins start and goal. */
export class UnreachableGoalError extends MazeError {
  constructor(start: readonly [number, number], goal: readonly [number, number]) {
    super(`Goal (${goal[0]}, ${goal[1]}) is unreachable from (${start[0]}, ${start[1]})`);
    this.name = 'UnreachableGoalError';
  }
}

/** The maze generator broke one of its own bookkeeping invariants; a programming error. */
export class GeneratorConsistencyError extends MazeError {
  constructor(message: string) {
    super(message);
    this.name = 'GeneratorConsistencyError';
  }
}

/** The move table and the search graph disagree; a programming error, never a user one. */
export class SolverConsistencyError extends MazeError {
  constructor(message: string) {
    super(message);
    this.name = 'SolverConsistencyError';
  }
}
