export type { RolloutPolicy } from './rollout-policy.js';
export type { RandomRolloutOptions } from './random-rollout-policy.js';
export type { ActionFilter } from './filtered-rollout-policy.js';
export { RandomRolloutPolicy } from './random-rollout-policy.js';
export { FilteredRolloutPolicy } from './filtered-rollout-policy.js';
