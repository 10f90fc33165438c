export {
    InMemoryProfileStore,
    parseProfileCatalog,
    loadProfileCatalog,
    defineProfile,
} from "./store.js";
export type { ProfileStore } from "./store.js";
