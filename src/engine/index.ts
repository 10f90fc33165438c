export { score, weakestOf, weightedOverall } from "./scorer.js";
export type { Scorer, ScoreOptions } from "./scorer.js";
export { mutate, selectStrategy, composeInitialRequest } from "./mutator.js";
export type { Mutator, MutationResult, MutationStrategy } from "./mutator.js";
