#!/usr/bin/env node
import readline from "node:readline";
import { bootstrap, enforceStartupGuards } from "../../../libs/bootstrap/startup.js";
import { loadRegistryConfig } from "../../../libs/bootstrap/config/registry-config.js";
import { logger } from "../../../libs/logging/logger.js";
import { handleLine } from "./lineProtocol.js";

async function main() {
    enforceStartupGuards();
    const config = loadRegistryConfig();
    logger.level = config.logLevel;

    const { registry, store } = await bootstrap("registry-node", config);
    logger.info("Registry node ready; reading command envelopes from stdin");

    const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

    // Strictly sequential: the next line is read only after this one is answered
    for await (const line of input) {
        if (line.trim() === '') continue;
        const response = await handleLine(registry, line);
        process.stdout.write(JSON.stringify(response) + "\n");
    }

    await store.close();
    logger.info("Input closed; registry node stopped");
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
