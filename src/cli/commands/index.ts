export { registerCoreCommands } from './core.js';
