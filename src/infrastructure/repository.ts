//
//
//

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { Logger } from "winston";

import { TaskFileNotFoundError, ValidationError } from "src/domain/errors";
import { GridLimits, Task, parseTask } from "src/domain/models";
import { TaskRepository } from "src/domain/ports";

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores tasks as JSON files on the local file system.
 */
export class JsonFileTaskRepository implements TaskRepository {
    private readonly _limits: GridLimits;

    private readonly _logger: Logger;

    public constructor(logger: Logger, limits: GridLimits = GridLimits.TASK) {
        this._logger = logger;
        this._limits = limits;
    }

    public async load(filePath: string): Promise<Task> {
        let content: string;
        try {
            content = await readFile(filePath, "utf-8");
        } catch (error) {
            if (isNotFound(error)) {
                throw new TaskFileNotFoundError(filePath);
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ValidationError(`${filePath} is not valid JSON: ${reason}`);
        }

        const task = parseTask(data, this._limits);
        this._logger.info(
            `Loaded ${filePath} (${task.train.length} train, ${task.test.length} test examples).`,
        );

        return task;
    }

    public async save(task: Task, filePath: string): Promise<void> {
        // the caller may keep mutating its task while the file is written
        const snapshot = parseTask(task, this._limits);

        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf-8");

        this._logger.info(`Saved ${filePath}.`);
    }
}
