import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { AttuneConfig, AttuneConfigOverrides } from "../../schemas/config.js";
import { loadProfileCatalog } from "../../profiles/store.js";
import type { InMemoryProfileStore } from "../../profiles/store.js";
import { LLMClient } from "../../llm/client.js";
import {
    PROVIDER_API_KEY_VARIABLES,
    hasProviderApiKey,
    resolveLanguageModel,
    resolveProviderName,
} from "../../llm/resolve.js";
import { ReliableTransport } from "../../llm/transport.js";
import { SqliteProvenanceStore } from "../../memory/sqlite.js";
import type { Logger } from "../../core/logger.js";
import { silentLogger } from "../../core/logger.js";
import { createCliLogger } from "../logger.js";

/** The sample catalog shipped at the package root. */
export const DEFAULT_PROFILES_PATH = fileURLToPath(new URL("../../../profiles/default.json", import.meta.url));
export const DEFAULT_DB_PATH = "attune.db";

export interface ConfigFlags {
    config?: string;
    attempts?: string;
    threshold?: string;
    concurrency?: string;
}

export interface OutputFlags {
    json?: boolean;
    verbose?: boolean;
}

export interface ModelFlags {
    provider?: string;
    model?: string;
}

export interface StoreFlags {
    db?: string;
    /** Commander sets this to false for `--no-persist`. */
    persist?: boolean;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
    const content = await fs.readFile(path.resolve(process.cwd(), filePath), "utf-8");
    return JSON.parse(content);
}

function parseNumberFlag(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Invalid ${flag} value: ${value}`);
    }
    return parsed;
}

/**
 * Resolve the effective configuration: schema defaults, then the JSON
 * config file, then `overrides` (a batch file's config), then CLI flags.
 */
export async function loadConfig(flags: ConfigFlags, overrides: AttuneConfigOverrides = {}): Promise<AttuneConfig> {
    const fromFile = flags.config ? AttuneConfigOverrides.parse(await readJsonFile(flags.config)) : {};
    const fromFlags: AttuneConfigOverrides = {};
    const attempts = parseNumberFlag("--attempts", flags.attempts);
    const threshold = parseNumberFlag("--threshold", flags.threshold);
    const concurrency = parseNumberFlag("--concurrency", flags.concurrency);
    if (attempts !== undefined) fromFlags.max_attempts = attempts;
    if (threshold !== undefined) fromFlags.threshold = threshold;
    if (concurrency !== undefined) fromFlags.max_concurrent = concurrency;

    return AttuneConfig.parse({ ...fromFile, ...overrides, ...fromFlags });
}

export async function loadProfiles(profilesPath?: string): Promise<InMemoryProfileStore> {
    return loadProfileCatalog(profilesPath ? path.resolve(process.cwd(), profilesPath) : DEFAULT_PROFILES_PATH);
}

export function createLogger(flags: OutputFlags): Logger {
    return flags.json ? silentLogger : createCliLogger({ verbose: flags.verbose });
}

export function createTransport(flags: ModelFlags, logger: Logger): ReliableTransport {
    const provider = resolveProviderName(flags.provider);
    if (!hasProviderApiKey(provider)) {
        throw new Error(`No API key for provider "${provider}". Set ${PROVIDER_API_KEY_VARIABLES[provider]}.`);
    }
    const oracle = new LLMClient(resolveLanguageModel(provider, flags.model));
    return new ReliableTransport({ oracle, logger });
}

/** Null under `--no-persist`. */
export function openStore(flags: StoreFlags): SqliteProvenanceStore | null {
    if (flags.persist === false) return null;
    return new SqliteProvenanceStore(path.resolve(process.cwd(), flags.db ?? DEFAULT_DB_PATH));
}

/**
 * Abort the returned signal on Ctrl-C. The loop finishes its in-flight
 * call and terminates with an `error` result.
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once("SIGINT", onInterrupt);
    return {
        signal: controller.signal,
        dispose: () => {
            process.removeListener("SIGINT", onInterrupt);
        },
    };
}

/** Command-boundary error reporting. */
export function reportFailure(title: string, err: unknown, flags: OutputFlags = {}): void {
    const message = err instanceof Error ? err.message : String(err);
    if (flags.json) {
        process.stderr.write(`${JSON.stringify({ error: message })}\n`);
    } else {
        p.log.error(chalk.red(title));
        p.log.error(message);
    }
    process.exitCode = 1;
}
