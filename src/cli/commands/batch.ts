import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import type { SqliteProvenanceStore } from "../../memory/sqlite.js";
import { BatchFile } from "../../schemas/batch.js";
import { runBatch, summarizeBatch } from "../../orchestrator.js";
import { formatSummary, statusLabel } from "../format.js";
import {
    createLogger,
    createTransport,
    interruptSignal,
    loadConfig,
    loadProfiles,
    openStore,
    readJsonFile,
    reportFailure,
} from "./shared.js";
import type { ConfigFlags, ModelFlags, OutputFlags, StoreFlags } from "./shared.js";

export interface BatchCommandOptions extends ConfigFlags, ModelFlags, OutputFlags, StoreFlags {
    file: string;
    profiles?: string;
}

export async function batchCommand(options: BatchCommandOptions): Promise<void> {
    if (!options.json) p.intro(chalk.bgCyan.black(" attune batch "));

    const interrupt = interruptSignal();
    let store: SqliteProvenanceStore | null = null;
    try {
        store = openStore(options);
        const batch = BatchFile.parse(await readJsonFile(options.file));
        const config = await loadConfig(options, batch.config);
        const profiles = await loadProfiles(options.profiles);
        const logger = createLogger(options);
        const transport = createTransport(options, logger);

        const total = batch.pairs.length;
        let done = 0;
        const spinner = options.json ? null : ora(`Running ${total} pairs (max ${config.max_concurrent} at once)...`).start();

        const results = await runBatch({
            pairs: batch.pairs.map((pair) => ({ profileId: pair.profile_id, scenario: pair.scenario })),
            maxConcurrent: config.max_concurrent,
            controller: { transport, profiles, config, logger, sink: store ?? undefined },
            signal: interrupt.signal,
            onRunComplete: (result, pairIndex) => {
                done++;
                if (spinner) spinner.text = `${done}/${total} done (#${pairIndex} ${result.profileId}: ${result.status})`;
            },
        });
        const summary = summarizeBatch(results);

        if (options.json) {
            process.stdout.write(`${JSON.stringify({ summary, results }, null, 2)}\n`);
        } else {
            spinner?.succeed(chalk.green(`Batch finished: ${total} pairs.`));
            for (const [i, result] of results.entries()) {
                p.log.message(`#${i} ${statusLabel(result.status)} ${chalk.bold(result.profileId)}: ${result.reason}`);
            }
            p.note(formatSummary(summary), "Summary");
            p.outro("Batch complete.");
        }
        process.exitCode = summary.counts.success === total ? 0 : 1;
    } catch (err) {
        reportFailure("Batch error:", err, options);
    } finally {
        interrupt.dispose();
        store?.close();
    }
}
