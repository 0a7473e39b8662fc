#!/usr/bin/env node
import "dotenv/config";

import { USAGE, parseCliArgs } from "./config.js";
import { ScenarioError } from "./errors.js";
import { runScenario } from "./scenario.js";

async function run() {
    const options = parseCliArgs(process.argv.slice(2), process.env);
    if (options.help) {
        console.log(USAGE);
        return;
    }
    // progress lines go, the warning summary stays
    const log = options.quiet ? { log: () => undefined, warn: console.warn } : console;
    await runScenario(options, log);
}

run().catch(err => {
    if (err instanceof ScenarioError) {
        console.error(`scenario failed (${err.code}): ${err.message}`);
        if (err.code === "INVALID_OPTIONS") console.error(`\n${USAGE}`);
    } else {
        console.error("scenario failed:", err);
    }
    process.exit(1);
});
