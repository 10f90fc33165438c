/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Configuration
export { AttuneConfig, AttuneConfigOverrides } from "./config.js";
export type { TransportSettings } from "./config.js";

// Profiles
export {
    WEIGHT_EPSILON,
    DimensionWeights,
    PatternSets,
    ProfileFraming,
    TargetProfile,
    ProfileCatalog,
} from "./profile.js";

// Batch input
export { BatchPairInput, BatchFile } from "./batch.js";
