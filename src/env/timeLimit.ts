import { ConfigurationError } from '../maze/maze.errors';
import type { Displacement, Grid, Position } from '../maze/maze.types';
import type {
  NavigationEnvironment,
  ResetOptions,
  ResetResult,
  StepResult,
} from './navigation.simulator';

/**
 * Episode-length wrapper. Counts steps since the last reset and reports
 * `truncated: true` on the step that reaches `maxEpisodeSteps`. The wrapped
 * environment itself never truncates.
 */
export class TimeLimit implements NavigationEnvironment {
  readonly env: NavigationEnvironment;
  readonly maxEpisodeSteps: number;
  #elapsedSteps = 0;

  constructor(env: NavigationEnvironment, maxEpisodeSteps: number) {
    if (!Number.isInteger(maxEpisodeSteps) || maxEpisodeSteps < 1) {
      throw new ConfigurationError(
        `maxEpisodeSteps must be a positive integer, got ${maxEpisodeSteps}`
      );
    }
    this.env = env;
    this.maxEpisodeSteps = maxEpisodeSteps;
  }

  /** Steps taken since the last reset. */
  get elapsedSteps(): number {
    return this.#elapsedSteps;
  }

  get width(): number {
    return this.env.width;
  }

  get height(): number {
    return this.env.height;
  }

  get moves(): readonly Displacement[] {
    return this.env.moves;
  }

  get grid(): Grid {
    return this.env.grid;
  }

  get agent(): Position {
    return this.env.agent;
  }

  get target(): Position {
    return this.env.target;
  }

  reset(options?: ResetOptions): ResetResult {
    this.#elapsedSteps = 0;
    return this.env.reset(options);
  }

  step(action: number): StepResult {
    const result = this.env.step(action);
    this.#elapsedSteps++;
    return this.#elapsedSteps >= this.maxEpisodeSteps ? { ...result, truncated: true } : result;
  }
}
