#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();


import { Command } from "commander";
import { batchCommand, profilesCommand, runCommand, statsCommand } from "./commands/index.js";

const program = new Command();

program
    .name("attune")
    .description("Adaptive convergence loop: steer LLM output toward a target profile")
    .version("0.1.0");

program
    .command("run")
    .description("Converge one scenario against one or more profiles")
    .option("-p, --profile <ids...>", "Target profile id(s); several run one after another")
    .option("--all-profiles", "Run against every profile in the catalog")
    .option("--require-all", "With several profiles, stop at the first that does not converge")
    .requiredOption("-s, --scenario <text>", "Scenario text")
    .option("-a, --attempts <number>", "Override max_attempts")
    .option("-t, --threshold <number>", "Override the convergence threshold")
    .option("--config <path>", "JSON config file")
    .option("--profiles <path>", "Profile catalog (default: bundled sample catalog)")
    .option("--db <path>", "SQLite provenance database", "attune.db")
    .option("--no-persist", "Do not record converged runs")
    .option("--provider <provider>", "LLM provider override (openai|google|anthropic)")
    .option("--model <model>", "LLM model override")
    .option("--json", "Print the result as JSON")
    .option("-v, --verbose", "Show debug log events")
    .action(runCommand);

program
    .command("batch")
    .description("Run many (profile, scenario) pairs with bounded concurrency")
    .requiredOption("-f, --file <path>", "Batch JSON file")
    .option("-c, --concurrency <number>", "Override max_concurrent")
    .option("--config <path>", "JSON config file")
    .option("--profiles <path>", "Profile catalog (default: bundled sample catalog)")
    .option("--db <path>", "SQLite provenance database", "attune.db")
    .option("--no-persist", "Do not record converged runs")
    .option("--provider <provider>", "LLM provider override (openai|google|anthropic)")
    .option("--model <model>", "LLM model override")
    .option("--json", "Print results as JSON")
    .option("-v, --verbose", "Show debug log events")
    .action(batchCommand);

program
    .command("profiles")
    .description("List the profiles in a catalog")
    .option("--profiles <path>", "Profile catalog (default: bundled sample catalog)")
    .option("--json", "Print profiles as JSON")
    .action(profilesCommand);

program
    .command("stats")
    .description("Summarize recorded (converged) runs")
    .option("--db <path>", "SQLite provenance database", "attune.db")
    .option("--profile <id>", "Restrict to one profile")
    .option("--limit <number>", "Recent runs to list", "10")
    .option("--prune <keep>", "Delete all but the most recent <keep> runs first")
    .option("--json", "Print statistics as JSON")
    .action(statsCommand);

await program.parseAsync(process.argv);
