//
//
//

import { ValidationError } from "../errors";
import { GridData, parseGridData } from "./grid";
import { GridLimits } from "./limits";

export interface TrainExample {
    input: number[][];
    output: number[][];
}

export interface TestExample {
    input: number[][];
    output?: number[][];
}

/**
 * A task: training pairs of input/output grids, and test inputs whose
 * outputs may be unknown.
 */
export interface Task {
    train: TrainExample[];
    test: TestExample[];
}

export type TaskSplit = "train" | "test";

export function createEmptyTask(): Task {
    return { train: [], test: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a single grid of a task.
 * @returns a deep copy of the grid.
 */
export function validateGridData(
    data: unknown,
    context: string,
    limits: GridLimits = GridLimits.TASK,
): number[][] {
    return parseGridData(data, limits, context);
}

/**
 * Validates an untrusted value (typically parsed JSON) as a task.
 * @returns a deep copy of the task. A missing `test` list becomes empty.
 * @throws ValidationError describing the first problem found.
 */
export function parseTask(data: unknown, limits: GridLimits = GridLimits.TASK): Task {
    if (!isRecord(data)) {
        throw new ValidationError("Task must be an object.");
    }
    if (!("train" in data)) {
        throw new ValidationError("Task must contain 'train' key.");
    }
    if (!Array.isArray(data.train)) {
        throw new ValidationError("'train' must be a list.");
    }

    const train: TrainExample[] = [];
    data.train.forEach((example: unknown, i: number) => {
        if (!isRecord(example)) {
            throw new ValidationError(`Train example ${i} must be an object.`);
        }
        if (!("input" in example) || !("output" in example)) {
            throw new ValidationError(`Train example ${i} must contain 'input' and 'output' keys.`);
        }

        train.push({
            input: validateGridData(example.input, `Train example ${i} input`, limits),
            output: validateGridData(example.output, `Train example ${i} output`, limits),
        });
    });

    const test: TestExample[] = [];
    if ("test" in data) {
        if (!Array.isArray(data.test)) {
            throw new ValidationError("'test' must be a list.");
        }

        data.test.forEach((example: unknown, i: number) => {
            if (!isRecord(example)) {
                throw new ValidationError(`Test example ${i} must be an object.`);
            }
            if (!("input" in example)) {
                throw new ValidationError(`Test example ${i} must contain 'input' key.`);
            }

            const parsed: TestExample = {
                input: validateGridData(example.input, `Test example ${i} input`, limits),
            };
            // the output of a test example is optional
            if ("output" in example) {
                parsed.output = validateGridData(
                    example.output,
                    `Test example ${i} output`,
                    limits,
                );
            }
            test.push(parsed);
        });
    }

    return { train, test };
}

export function addTrainExample(
    task: Task,
    input: GridData,
    output: GridData,
    limits: GridLimits = GridLimits.TASK,
): void {
    task.train.push({
        input: validateGridData(input, "Input grid", limits),
        output: validateGridData(output, "Output grid", limits),
    });
}

export function addTestExample(
    task: Task,
    input: GridData,
    output?: GridData,
    limits: GridLimits = GridLimits.TASK,
): void {
    const example: TestExample = { input: validateGridData(input, "Input grid", limits) };
    if (output !== undefined) {
        example.output = validateGridData(output, "Output grid", limits);
    }
    task.test.push(example);
}
