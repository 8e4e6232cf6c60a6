import { ConfigurationError } from '../maze/maze.errors';
import type { RandomSource } from '../maze/maze.types';
import { NavigationSimulator, type NavigationEnvironment } from './navigation.simulator';
import { densityMazeStrategy, wilsonMazeStrategy } from './navigation.strategies';
import { TimeLimit } from './timeLimit';

/** Which generator a registered environment uses. */
export type MazeGeneratorKind = 'wilson' | 'density';

/** Everything needed to build a registered environment. */
export interface EnvironmentSpec {
  id: string;
  width: number;
  height: number;
  /** Step limit applied through {@link TimeLimit}; omit for unlimited episodes. */
  maxEpisodeSteps?: number;
  generator: MazeGeneratorKind;
  /** Density generator tuning; ignored by Wilson. */
  complexity?: number;
  density?: number;
}

/** Options for {@link makeEnvironment}. */
export interface MakeOptions {
  /** Override the registered step limit. */
  maxEpisodeSteps?: number;
  /** Initial random source handed to the simulator. */
  rng?: RandomSource;
}

const registry = new Map<string, EnvironmentSpec>();

/**
 * Register an environment under `spec.id`.
 *
 * @throws ConfigurationError when the id is taken.
 */
export function registerEnvironment(spec: EnvironmentSpec): void {
  if (registry.has(spec.id)) {
    throw new ConfigurationError(`Environment '${spec.id}' is already registered`);
  }
  registry.set(spec.id, { ...spec });
}

/** Remove a registration; returns whether it existed. */
export function unregisterEnvironment(id: string): boolean {
  return registry.delete(id);
}

/** Registered specs in registration order. */
export function listEnvironments(): EnvironmentSpec[] {
  return Array.from(registry.values(), (spec) => ({ ...spec }));
}

/**
 * Build a registered environment: a {@link NavigationSimulator} using the spec's
 * generator, wrapped in {@link TimeLimit} when a step limit applies.
 *
 * @throws ConfigurationError for unknown ids.
 * @example
 * const env = makeEnvironment('RandomMaze-11x11-v0');
 * env.reset({ seed: 1 });
 */
export function makeEnvironment(id: string, options: MakeOptions = {}): NavigationEnvironment {
  const spec = registry.get(id);
  if (!spec) throw new ConfigurationError(`Unknown environment '${id}'`);

  const size = { width: spec.width, height: spec.height };
  const strategy =
    spec.generator === 'density'
      ? densityMazeStrategy({ ...size, complexity: spec.complexity, density: spec.density })
      : wilsonMazeStrategy(size);
  const simulator = new NavigationSimulator({ ...size, strategy, rng: options.rng });

  const maxEpisodeSteps = options.maxEpisodeSteps ?? spec.maxEpisodeSteps;
  return maxEpisodeSteps === undefined ? simulator : new TimeLimit(simulator, maxEpisodeSteps);
}

// Built-in random mazes: [side, step limit].
const DEFAULT_SIZES: ReadonlyArray<readonly [number, number]> = [
  [11, 200],
  [15, 200],
  [21, 400],
  [31, 400],
  [51, 500],
  [101, 1000],
];

for (const [side, maxEpisodeSteps] of DEFAULT_SIZES) {
  registerEnvironment({
    id: `RandomMaze-${side}x${side}-v0`,
    width: side,
    height: side,
    maxEpisodeSteps,
    generator: 'wilson',
  });
}
