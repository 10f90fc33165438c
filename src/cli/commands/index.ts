export { runCommand } from "./run.js";
export { batchCommand } from "./batch.js";
export { profilesCommand } from "./profiles.js";
export { statsCommand } from "./stats.js";
