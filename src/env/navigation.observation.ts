import type { CellState, Position } from '../maze/maze.types';

/**
 * Observation cell codes.
 *
 * An observation is a copy of the grid (floor 0, wall 1) with the agent and target
 * cells overwritten; when the agent stands on the target the cell reads
 * `AgentOnTarget` instead.
 */
export const ObservationCode = {
  Empty: 0,
  Wall: 1,
  Agent: 2,
  Target: 3,
  AgentOnTarget: 4,
} as const;
export type ObservationCode = (typeof ObservationCode)[keyof typeof ObservationCode];

/** Grid-shaped observation, indexed `[row][col]`. */
export type Observation = ObservationCode[][];

/** Overlay agent and target onto a fresh copy of `grid`. */
export function encodeObservation(
  grid: ReadonlyArray<ReadonlyArray<CellState>>,
  agent: Position,
  target: Position
): Observation {
  const observation: Observation = grid.map((row) => row.slice());
  if (agent[0] === target[0] && agent[1] === target[1]) {
    observation[agent[0]][agent[1]] = ObservationCode.AgentOnTarget;
  } else {
    observation[agent[0]][agent[1]] = ObservationCode.Agent;
    observation[target[0]][target[1]] = ObservationCode.Target;
  }
  return observation;
}

/** Locate the agent cell of an observation, or `null` when absent. */
export function findAgent(observation: ReadonlyArray<ReadonlyArray<ObservationCode>>): Position | null {
  for (let row = 0; row < observation.length; row++) {
    for (let col = 0; col < observation[row].length; col++) {
      const code = observation[row][col];
      if (code === ObservationCode.Agent || code === ObservationCode.AgentOnTarget) {
        return [row, col];
      }
    }
  }
  return null;
}
