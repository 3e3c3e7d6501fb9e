//
//
//

import * as dotenv from "dotenv";

import { EditorSession } from "./domain/editor";
import { COMMANDS, JsonFileTaskRepository, getConfig, runCommand } from "./infrastructure";
import { createAppLogger } from "./utils";

const USAGE = `Usage: arc-grid <${COMMANDS.join("|")}> --file <task.json> [options]`;

async function main() {
    dotenv.config();

    const [config, options] = getConfig(process.argv.slice(2), process.env);
    const logger = createAppLogger(config.logLevel);

    if (options.command === null) {
        // eslint-disable-next-line no-console
        console.log(USAGE);
        return;
    }

    const repository = new JsonFileTaskRepository(logger, config.limits);
    const session = new EditorSession({
        repository,
        logger,
        limits: config.limits,
        palette: config.palette,
    });

    try {
        // eslint-disable-next-line no-console
        await runCommand(options, session, repository, (line) => console.log(line));
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
}

main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
