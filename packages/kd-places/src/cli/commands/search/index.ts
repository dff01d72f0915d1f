/**
 * Search Commands Index
 *
 * Registers the spatial query commands:
 * - nearest: closest place to a coordinate
 * - area: places within a radius in km
 * - box: places inside a lon/lat rectangle
 */

import type { Command } from 'commander';
import { registerAreaCommand } from './area.js';
import { registerBoxCommand } from './box.js';
import { registerNearestCommand } from './nearest.js';

export { runArea } from './area.js';
export { runBox } from './box.js';
export { runNearest } from './nearest.js';

/**
 * Register all search commands on the program
 *
 * @param program - Commander program instance
 */
export function registerSearchCommands(program: Command): void {
  registerNearestCommand(program);
  registerAreaCommand(program);
  registerBoxCommand(program);
}
