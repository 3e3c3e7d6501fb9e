import { describe, it, expect, beforeEach } from "vitest";

import { EditorSession } from "src/domain/editor";
import { TaskFileNotFoundError, UnknownCommandError } from "src/domain/errors";
import { GridLimits, Task, parseTask } from "src/domain/models";
import { TaskRepository } from "src/domain/ports";
import { createAppLogger } from "src/utils";
import { runCommand } from "./commands";
import { CommandOptions } from "./config";

class InMemoryTaskRepository implements TaskRepository {
    public readonly files = new Map<string, Task>();

    public async load(path: string): Promise<Task> {
        const task = this.files.get(path);
        if (task === undefined) {
            throw new TaskFileNotFoundError(path);
        }
        return parseTask(task, GridLimits.DEFAULT);
    }

    public async save(task: Task, path: string): Promise<void> {
        this.files.set(path, parseTask(task, GridLimits.DEFAULT));
    }
}

function options(overrides: Partial<CommandOptions>): CommandOptions {
    return {
        command: null,
        file: "task.json",
        split: "train",
        example: 0,
        side: "input",
        x: null,
        y: null,
        color: null,
        width: null,
        height: null,
        ...overrides,
    };
}

describe("runCommand", () => {
    let repository: InMemoryTaskRepository;
    let session: EditorSession;
    let lines: string[];

    const run = (overrides: Partial<CommandOptions>) =>
        runCommand(options(overrides), session, repository, (line) => lines.push(line));

    beforeEach(() => {
        repository = new InMemoryTaskRepository();
        session = new EditorSession({ repository, logger: createAppLogger("info", true) });
        lines = [];
        repository.files.set("task.json", {
            train: [
                {
                    input: [
                        [0, 0, 1],
                        [0, 1, 1],
                    ],
                    output: [[2]],
                },
            ],
            test: [{ input: [[3, 4]] }],
        });
    });

    it("shows the selected grid", async () => {
        await run({ command: "show" });
        await run({ command: "show", split: "test" });

        expect(lines).toEqual([
            "train[0].input: Grid(3×2)",
            "0 0 1\n0 1 1",
            "test[0].input: Grid(2×1)",
            "3 4",
        ]);
    });

    it("reports examples that do not exist", async () => {
        await expect(run({ command: "show", example: 1 })).rejects.toThrow(
            "task.json has no train example 1 (1 available).",
        );
        await expect(run({ command: "show", split: "test", side: "output" })).rejects.toThrow(
            "Test example 0 of task.json has no output.",
        );
    });

    it("flood fills and saves the task", async () => {
        await run({ command: "fill", x: 0, y: 0, color: 5 });

        expect(lines).toEqual(["3 cell(s) changed.", "5 5 1\n5 1 1"]);
        expect(repository.files.get("task.json")?.train[0]).toEqual({
            input: [
                [5, 5, 1],
                [5, 1, 1],
            ],
            output: [[2]],
        });
    });

    it("paints a single cell", async () => {
        await run({ command: "paint", x: 2, y: 0, color: 7 });

        expect(lines[0]).toBe("1 cell(s) changed.");
        expect(repository.files.get("task.json")?.train[0].input).toEqual([
            [0, 0, 7],
            [0, 1, 1],
        ]);
    });

    it("requires the arguments of a command", async () => {
        await expect(run({ command: "fill", x: 0, y: 0 })).rejects.toThrow("Missing option --color.");
        await expect(run({ command: "show", file: null })).rejects.toThrow("Missing option --file.");
    });

    it("resizes and clears the grid", async () => {
        await run({ command: "resize", width: 2, height: 3 });
        expect(repository.files.get("task.json")?.train[0].input).toEqual([
            [0, 0],
            [0, 1],
            [0, 0],
        ]);

        await run({ command: "clear" });
        expect(repository.files.get("task.json")?.train[0].input).toEqual([
            [0, 0],
            [0, 0],
            [0, 0],
        ]);
    });

    it("creates a new task", async () => {
        await run({ command: "new", file: "new.json", width: 2, height: 1 });

        expect(lines).toEqual(["Created new.json with a 2×1 grid."]);
        expect(repository.files.get("new.json")).toEqual({
            train: [{ input: [[0, 0]], output: [[0, 0]] }],
            test: [],
        });
    });

    it("rejects unknown commands", async () => {
        await expect(run({ command: "rotate" })).rejects.toThrow(UnknownCommandError);
    });
});
