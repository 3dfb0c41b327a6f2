// Maze adapter exports
export { MazeEnvironment, positionKey } from './environment.js';
export type { MazeEnvironmentOptions, MazeTarget, Position } from './environment.js';
export { MazeState, mazeActionKey } from './state.js';
export type { MazeAction } from './state.js';
