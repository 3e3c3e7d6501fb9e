//
//
//

import { EditorSession, Tool } from "src/domain/editor";
import { UnknownCommandError, ValidationError } from "src/domain/errors";
import { Grid, GridLimits } from "src/domain/models";
import { TaskRepository } from "src/domain/ports";
import { CommandOptions } from "./config";

export const COMMANDS = ["show", "new", "paint", "fill", "resize", "clear"] as const;

function required<T>(value: T | null, name: string): T {
    if (value === null) {
        throw new ValidationError(`Missing option --${name}.`);
    }

    return value;
}

async function show(
    options: CommandOptions,
    repository: TaskRepository,
    limits: GridLimits,
    print: (line: string) => void,
): Promise<void> {
    const file = required(options.file, "file");
    const task = await repository.load(file);

    const examples = options.split === "train" ? task.train : task.test;
    if (options.example < 0 || options.example >= examples.length) {
        throw new ValidationError(
            `${file} has no ${options.split} example ${options.example} (${examples.length} available).`,
        );
    }

    const example = examples[options.example];
    const data = options.side === "input" ? example.input : example.output;
    if (data === undefined) {
        throw new ValidationError(`Test example ${options.example} of ${file} has no output.`);
    }

    const grid = Grid.fromList(data, limits);
    print(`${options.split}[${options.example}].${options.side}: ${grid.describe()}`);
    print(grid.toString());
}

/**
 * Runs a single command of the command line shell.
 * @param options The parsed command line options.
 * @param session The session used to edit grids.
 * @param repository The repository the tasks are read from.
 * @param print Where the output of the command is written.
 */
export async function runCommand(
    options: CommandOptions,
    session: EditorSession,
    repository: TaskRepository,
    print: (line: string) => void,
): Promise<void> {
    const command = required(options.command, "command");

    switch (command) {
        case "show": {
            await show(options, repository, session.limits, print);
            return;
        }
        case "new": {
            const file = required(options.file, "file");
            session.newTask(
                options.width ?? EditorSession.DEFAULT_SIZE,
                options.height ?? EditorSession.DEFAULT_SIZE,
            );
            await session.save(file);
            print(`Created ${file} with a ${session.grid.width}×${session.grid.height} grid.`);
            return;
        }
        case "paint":
        case "fill": {
            const file = required(options.file, "file");
            const x = required(options.x, "x");
            const y = required(options.y, "y");
            const color = required(options.color, "color");

            await session.open(file);
            session.selectTool(command === "paint" ? Tool.PAINT : Tool.FILL);
            session.selectColor(color);
            const changed = session.applyAt(x, y);
            if (changed.length > 0) {
                await session.save();
            }

            print(`${changed.length} cell(s) changed.`);
            print(session.grid.toString());
            return;
        }
        case "resize": {
            const file = required(options.file, "file");
            const width = required(options.width, "width");
            const height = required(options.height, "height");

            await session.open(file);
            session.resize(width, height);
            await session.save();

            print(`Resized to ${session.grid.describe()}.`);
            print(session.grid.toString());
            return;
        }
        case "clear": {
            const file = required(options.file, "file");

            await session.open(file);
            session.clear();
            await session.save();

            print(session.grid.toString());
            return;
        }
        default:
            throw new UnknownCommandError(command);
    }
}
