/**
 * CLI Logger — renders structured log events through @clack/prompts.
 */
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { LogFields, Logger } from "../core/logger.js";

function renderFields(fields?: LogFields): string {
    if (!fields) return "";
    const parts = Object.entries(fields)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
    return parts.length > 0 ? ` ${chalk.dim(parts.join(" "))}` : "";
}

export interface CliLoggerOptions {
    /** Show debug events. */
    verbose?: boolean;
}

export function createCliLogger(options: CliLoggerOptions = {}): Logger {
    return {
        debug: (event, fields) => {
            if (options.verbose) p.log.message(chalk.gray(event) + renderFields(fields));
        },
        info: (event, fields) => p.log.info(chalk.blue(event) + renderFields(fields)),
        warn: (event, fields) => p.log.warn(chalk.yellow(event) + renderFields(fields)),
        error: (event, fields) => p.log.error(chalk.red(event) + renderFields(fields)),
    };
}
