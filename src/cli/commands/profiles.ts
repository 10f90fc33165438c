import * as p from "@clack/prompts";
import chalk from "chalk";
import { DIMENSIONS } from "../../core/types.js";
import { loadProfiles, reportFailure } from "./shared.js";
import type { OutputFlags } from "./shared.js";

export interface ProfilesCommandOptions extends OutputFlags {
    profiles?: string;
}

export async function profilesCommand(options: ProfilesCommandOptions): Promise<void> {
    try {
        const store = await loadProfiles(options.profiles);
        const profiles = await store.listProfiles();

        if (options.json) {
            process.stdout.write(`${JSON.stringify(profiles, null, 2)}\n`);
            return;
        }

        p.intro(chalk.bgBlue.black(" attune profiles "));
        for (const profile of profiles) {
            const weights = DIMENSIONS
                .map((dim) => `${dim} ${profile.dimension_weights[dim].toFixed(2)}`)
                .join(", ");
            p.log.info(`${chalk.cyan.bold(profile.id)}  ${profile.name}`);
            if (profile.description) p.log.message(chalk.dim(profile.description));
            p.log.message(`weights: ${weights}`);
        }
        p.outro(`${profiles.length} profile(s).`);
    } catch (err) {
        reportFailure("Could not load profiles:", err, options);
    }
}
