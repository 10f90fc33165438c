/**
 * Profile Store — resolves profile ids to validated, frozen TargetProfiles.
 *
 * Profiles are loaded once and shared read-only across every concurrent
 * run, so the store deep-freezes them on the way in.
 */
import fs from "fs/promises";
import { ProfileCatalog, TargetProfile } from "../schemas/profile.js";
import { InvalidProfileError, ProfileNotFoundError } from "../errors/index.js";

export interface ProfileStore {
    /** Rejects with ProfileNotFoundError for an unknown id. */
    getProfile(profileId: string): Promise<TargetProfile>;
    listProfiles(): Promise<TargetProfile[]>;
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

export class InMemoryProfileStore implements ProfileStore {
    private profiles = new Map<string, TargetProfile>();

    constructor(profiles: Iterable<TargetProfile>) {
        for (const profile of profiles) {
            this.profiles.set(profile.id, deepFreeze(profile));
        }
    }

    async getProfile(profileId: string): Promise<TargetProfile> {
        const profile = this.profiles.get(profileId);
        if (!profile) throw new ProfileNotFoundError(profileId);
        return profile;
    }

    async listProfiles(): Promise<TargetProfile[]> {
        return [...this.profiles.values()];
    }
}

function formatIssues(issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>): string[] {
    return issues.map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validate raw catalog data. Every issue is collected into one
 * InvalidProfileError so a broken catalog is reported in full.
 */
export function parseProfileCatalog(data: unknown, source: string = "<inline>"): InMemoryProfileStore {
    const parsed = ProfileCatalog.safeParse(data);
    if (!parsed.success) {
        throw new InvalidProfileError(source, formatIssues(parsed.error.issues));
    }
    return new InMemoryProfileStore(parsed.data.profiles);
}

/** Read and validate a JSON profile catalog from disk. */
export async function loadProfileCatalog(filePath: string): Promise<InMemoryProfileStore> {
    const content = await fs.readFile(filePath, "utf-8");
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new InvalidProfileError(filePath, [`not valid JSON: ${message}`]);
    }
    return parseProfileCatalog(data, filePath);
}

/** Validate a single profile object (used by tests and embedders). */
export function defineProfile(data: unknown): TargetProfile {
    const parsed = TargetProfile.safeParse(data);
    if (!parsed.success) {
        throw new InvalidProfileError("<profile>", formatIssues(parsed.error.issues));
    }
    return parsed.data;
}
