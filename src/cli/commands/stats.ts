import * as p from "@clack/prompts";
import chalk from "chalk";
import { SqliteProvenanceStore } from "../../memory/sqlite.js";
import { convergedRunStatistics, formatStatistics, statusLabel } from "../format.js";
import { DEFAULT_DB_PATH, reportFailure } from "./shared.js";
import type { OutputFlags } from "./shared.js";

export interface StatsCommandOptions extends OutputFlags {
    db?: string;
    profile?: string;
    limit?: string;
    /** Keep only this many most recent runs. */
    prune?: string;
}

export async function statsCommand(options: StatsCommandOptions): Promise<void> {
    let store: SqliteProvenanceStore | null = null;
    try {
        store = new SqliteProvenanceStore(options.db ?? DEFAULT_DB_PATH);

        let pruned: number | null = null;
        if (options.prune !== undefined) {
            pruned = store.pruneRuns(Number(options.prune));
        }

        const limit = options.limit !== undefined ? Number(options.limit) : 10;
        if (!Number.isInteger(limit) || limit < 1) {
            throw new Error(`Invalid --limit value: ${options.limit}`);
        }
        const statistics = convergedRunStatistics(store.getStatistics(options.profile));
        const recent = store.listRuns({ profileId: options.profile, limit });

        if (options.json) {
            process.stdout.write(`${JSON.stringify({ statistics, recent, pruned }, null, 2)}\n`);
            return;
        }

        p.intro(chalk.bgGreen.black(" attune stats "));
        if (pruned !== null) p.log.warn(`Pruned ${pruned} run(s).`);
        p.note(
            formatStatistics(statistics),
            options.profile ? `Converged runs for ${options.profile}` : "Converged runs",
        );
        for (const run of recent) {
            p.log.message(
                `${chalk.dim(run.createdAt)} ${statusLabel(run.status)} ${chalk.bold(run.profileId)} ` +
                `attempts=${run.totalAttempts} best=${run.bestOverall === null ? "n/a" : run.bestOverall.toFixed(3)}`,
            );
        }
        p.outro("Done.");
    } catch (err) {
        reportFailure("Stats error:", err, options);
    } finally {
        store?.close();
    }
}
