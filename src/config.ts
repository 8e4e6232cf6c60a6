/**
 * Global maze-navigation configuration contract & default instance.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'maze-navigation';
 *   config.warnings = true; // surface generator caveats on stderr
 *
 * Adjust BEFORE generating mazes or constructing simulators so that subsystems read
 * the intended values.
 *
 * Randomness is deliberately absent from this object: every generator and simulator
 * receives its own RNG handle.
 */
export interface MazeNavigationConfig {
  /**
   * Emit runtime caveats (e.g. the legacy density generator giving no perfect-maze
   * guarantee) through `console.warn`. Each distinct warning is printed once.
   * Default: false
   */
  warnings: boolean;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: MazeNavigationConfig = {
  warnings: false, // emit runtime guidance
};
