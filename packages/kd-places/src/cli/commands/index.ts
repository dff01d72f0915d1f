/**
 * CLI Commands Index
 */

export { registerPlacesCommands } from './places/index.js';
export { registerSearchCommands } from './search/index.js';
