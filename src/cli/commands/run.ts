import * as p from "@clack/prompts";
import chalk from "chalk";
import { ConvergenceController } from "../../core/controller.js";
import type { ConvergenceControllerOptions } from "../../core/controller.js";
import type { AttemptRecord } from "../../core/types.js";
import type { SqliteProvenanceStore } from "../../memory/sqlite.js";
import { runAcrossProfiles, summarizeBatch } from "../../orchestrator.js";
import { describeAttempt, formatResult, formatSummary, statusLabel } from "../format.js";
import {
    createLogger,
    createTransport,
    interruptSignal,
    loadConfig,
    loadProfiles,
    openStore,
    reportFailure,
} from "./shared.js";
import type { ConfigFlags, ModelFlags, OutputFlags, StoreFlags } from "./shared.js";

export interface RunCommandOptions extends ConfigFlags, ModelFlags, OutputFlags, StoreFlags {
    /** Commander collects repeated or space-separated ids into a list. */
    profile?: string[];
    scenario: string;
    profiles?: string;
    allProfiles?: boolean;
    requireAll?: boolean;
}

function selectProfileIds(options: RunCommandOptions): string[] {
    const ids = options.profile ?? [];
    if (options.allProfiles && ids.length > 0) {
        throw new Error("Use either --profile or --all-profiles, not both.");
    }
    if (!options.allProfiles && ids.length === 0) {
        throw new Error("Pass --profile <id...> or --all-profiles.");
    }
    return ids;
}

export async function runCommand(options: RunCommandOptions): Promise<void> {
    if (!options.json) p.intro(chalk.bgMagenta.black(" attune run "));

    const interrupt = interruptSignal();
    let store: SqliteProvenanceStore | null = null;
    try {
        const profileIds = selectProfileIds(options);
        store = openStore(options);
        const config = await loadConfig(options);
        const profiles = await loadProfiles(options.profiles);
        const logger = createLogger(options);
        const transport = createTransport(options, logger);
        const wiring: ConvergenceControllerOptions = { transport, profiles, config, logger, sink: store ?? undefined };

        if (profileIds.length === 1) {
            await runSingle(profileIds[0], options, wiring, interrupt.signal);
        } else {
            await runMany(profileIds, options, wiring, interrupt.signal);
        }
    } catch (err) {
        reportFailure("Run error:", err, options);
    } finally {
        interrupt.dispose();
        store?.close();
    }
}

async function runSingle(
    profileId: string,
    options: RunCommandOptions,
    wiring: ConvergenceControllerOptions,
    signal: AbortSignal,
): Promise<void> {
    const controller = new ConvergenceController(wiring);
    if (!options.json) {
        controller.on("attempt:start", ({ index }: { index: number }) => {
            p.log.step(`Attempt ${index}/${wiring.config.max_attempts}`);
        });
        controller.on("attempt:complete", ({ record }: { record: AttemptRecord }) => {
            p.log.message(describeAttempt(record));
        });
    }

    const result = await controller.run(profileId, options.scenario, { signal });

    if (options.json) {
        process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
        p.note(formatResult(result), "Result");
        p.outro(result.status === "success" ? "Converged." : "Did not converge.");
    }
    process.exitCode = result.status === "success" ? 0 : 1;
}

/** An empty id list means every profile in the catalog. */
async function runMany(
    profileIds: string[],
    options: RunCommandOptions,
    wiring: ConvergenceControllerOptions,
    signal: AbortSignal,
): Promise<void> {
    const { results, stoppedEarly } = await runAcrossProfiles({
        scenario: options.scenario,
        profileIds,
        requireAllSuccess: options.requireAll,
        controller: wiring,
        signal,
        onRunComplete: (result) => {
            if (!options.json) {
                p.log.message(`${statusLabel(result.status)} ${chalk.bold(result.profileId)}: ${result.reason}`);
            }
        },
    });
    const summary = summarizeBatch(results);

    if (options.json) {
        process.stdout.write(`${JSON.stringify({ summary, stoppedEarly, results }, null, 2)}\n`);
    } else {
        if (stoppedEarly) p.log.warn("Stopped at the first profile that did not converge (--require-all).");
        p.note(formatSummary(summary), "Summary");
        p.outro(`${summary.counts.success}/${results.length} profiles converged.`);
    }
    process.exitCode = !stoppedEarly && summary.counts.success === results.length ? 0 : 1;
}
