import {
  ConfigurationError,
  EpisodeStateError,
  InvalidActionError,
  ShapeMismatchError,
} from '../maze/maze.errors';
import { cloneGrid, gridShape, isFloor, isRectangular } from '../maze/maze.grid';
import { createRng, type Seed } from '../maze/maze.rng';
import {
  CellState,
  MOVES,
  isAction,
  type Displacement,
  type Grid,
  type MazeStrategy,
  type Position,
  type RandomSource,
} from '../maze/maze.types';
import { encodeObservation, type Observation } from './navigation.observation';

/** Reward contract: goal > step cost > collision penalty. */
export const REWARDS = Object.freeze({
  goal: 1,
  step: -0.01,
  collision: -1,
});

/** Lifecycle of a simulator instance. */
export type EpisodeState = 'idle' | 'running' | 'terminated';

/** Construction options for {@link NavigationSimulator}. */
export interface NavigationSimulatorOptions {
  /** Grid columns including the border; odd. */
  width: number;
  /** Grid rows including the border; odd. */
  height: number;
  /** Produces the grid and endpoints on every reset. */
  strategy: MazeStrategy;
  /** Initial random source. Defaults to an entropy-seeded `seedrandom` PRNG. */
  rng?: RandomSource;
}

/** Options accepted by {@link NavigationSimulator.reset}. */
export interface ResetOptions {
  /** Reseed the simulator's random source before generating the next maze. */
  seed?: Seed;
}

/** Auxiliary data returned with every observation. */
export interface StepInfo {
  /** Manhattan distance between agent and target. */
  distance: number;
  agent: Position;
  target: Position;
}

export interface ResetResult {
  observation: Observation;
  info: StepInfo;
}

export interface StepResult {
  observation: Observation;
  reward: number;
  terminated: boolean;
  /** Always false here; step limits belong to `TimeLimit`. */
  truncated: boolean;
  info: StepInfo;
}

/** Common surface of the simulator and its wrappers. */
export interface NavigationEnvironment {
  readonly width: number;
  readonly height: number;
  readonly moves: readonly Displacement[];
  readonly grid: Grid;
  readonly agent: Position;
  readonly target: Position;
  reset(options?: ResetOptions): ResetResult;
  step(action: number): StepResult;
}

function assertOddDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 3 || value % 2 === 0) {
    throw new ConfigurationError(`Maze ${name} must be an odd integer >= 3, got ${value}`);
  }
}

/**
 * Grid navigation state machine.
 *
 * `reset()` asks the strategy for a fresh layout and moves to `running`; `step()`
 * applies one move:
 *
 *  - target cell is a wall: the agent stays, reward {@link REWARDS.collision};
 *  - target cell is the goal: the agent moves, reward {@link REWARDS.goal}, episode terminates;
 *  - otherwise: the agent moves, reward {@link REWARDS.step}.
 *
 * @example
 * const sim = new NavigationSimulator({ width: 11, height: 11, strategy: wilsonMazeStrategy({ width: 11, height: 11 }) });
 * const { info } = sim.reset({ seed: 0 });
 * const { reward, terminated } = sim.step(0);
 */
export class NavigationSimulator implements NavigationEnvironment {
  readonly width: number;
  readonly height: number;
  /** Action → displacement table; fixed for the lifetime of the instance. */
  readonly moves: readonly Displacement[] = MOVES;

  #strategy: MazeStrategy;
  #rng: RandomSource;
  #state: EpisodeState = 'idle';
  #grid: Grid = [];
  #agent: Position = [0, 0];
  #previousAgent: Position | null = null;
  #target: Position = [0, 0];

  constructor(options: NavigationSimulatorOptions) {
    assertOddDimension('width', options.width);
    assertOddDimension('height', options.height);
    this.width = options.width;
    this.height = options.height;
    this.#strategy = options.strategy;
    this.#rng = options.rng ?? createRng();
  }

  /** Current lifecycle state. */
  get state(): EpisodeState {
    return this.#state;
  }

  /** Copy of the current grid (empty before the first reset). */
  get grid(): Grid {
    return cloneGrid(this.#grid);
  }

  get agent(): Position {
    return this.#agent;
  }

  /** Cell the agent occupied before its last successful move; `null` right after reset. */
  get previousAgent(): Position | null {
    return this.#previousAgent;
  }

  get target(): Position {
    return this.#target;
  }

  /**
   * Start a new episode.
   *
   * @throws ShapeMismatchError when the strategy's grid differs from `height × width`.
   * @throws ConfigurationError when the agent or target is not an in-bounds floor cell.
   */
  reset(options: ResetOptions = {}): ResetResult {
    if (options.seed !== undefined) this.#rng = createRng(options.seed);

    const layout = this.#strategy(this.#rng);
    const [rows, cols] = gridShape(layout.grid);
    if (!isRectangular(layout.grid) || rows !== this.height || cols !== this.width) {
      throw new ShapeMismatchError([this.height, this.width], [rows, cols]);
    }
    for (const [name, position] of [
      ['agent', layout.agent],
      ['target', layout.target],
    ] as const) {
      if (!isFloor(layout.grid, position)) {
        throw new ConfigurationError(
          `Maze ${name} (${position[0]}, ${position[1]}) is not an in-bounds floor cell`
        );
      }
    }

    this.#grid = cloneGrid(layout.grid);
    this.#agent = [layout.agent[0], layout.agent[1]];
    this.#target = [layout.target[0], layout.target[1]];
    this.#previousAgent = null;
    this.#state = 'running';

    return { observation: this.#observe(), info: this.#info() };
  }

  /**
   * Apply one action.
   *
   * @throws InvalidActionError for anything other than 0, 1, 2 or 3.
   * @throws EpisodeStateError before the first reset or after termination.
   */
  step(action: number): StepResult {
    if (!isAction(action)) throw new InvalidActionError(action);
    if (this.#state !== 'running') {
      throw new EpisodeStateError(
        this.#state === 'idle'
          ? 'step() called before reset()'
          : 'step() called after the episode terminated; call reset() first'
      );
    }

    const [dr, dc] = this.moves[action];
    const candidate: Position = [this.#agent[0] + dr, this.#agent[1] + dc];
    let reward: number;
    let terminated = false;

    if (this.#blocked(candidate)) {
      reward = REWARDS.collision;
    } else {
      this.#previousAgent = this.#agent;
      this.#agent = candidate;
      if (candidate[0] === this.#target[0] && candidate[1] === this.#target[1]) {
        reward = REWARDS.goal;
        terminated = true;
        this.#state = 'terminated';
      } else {
        reward = REWARDS.step;
      }
    }

    return {
      observation: this.#observe(),
      reward,
      terminated,
      truncated: false,
      info: this.#info(),
    };
  }

  // Cells outside the grid count as walls.
  #blocked(position: Position): boolean {
    const row = this.#grid[position[0]];
    return row === undefined || row[position[1]] !== CellState.Floor;
  }

  #observe(): Observation {
    return encodeObservation(this.#grid, this.#agent, this.#target);
  }

  #info(): StepInfo {
    return {
      distance:
        Math.abs(this.#agent[0] - this.#target[0]) + Math.abs(this.#agent[1] - this.#target[1]),
      agent: [this.#agent[0], this.#agent[1]],
      target: [this.#target[0], this.#target[1]],
    };
  }
}
