import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors";
import { GridLimits } from "./limits";
import {
    addTestExample,
    addTrainExample,
    createEmptyTask,
    parseTask,
    validateGridData,
} from "./task";

describe("parseTask", () => {
    it("accepts a task with train and test examples", () => {
        const task = parseTask({
            train: [{ input: [[1, 2]], output: [[2, 1]] }],
            test: [{ input: [[3]] }, { input: [[4]], output: [[5]] }],
        });

        expect(task).toEqual({
            train: [{ input: [[1, 2]], output: [[2, 1]] }],
            test: [{ input: [[3]] }, { input: [[4]], output: [[5]] }],
        });
        expect("output" in task.test[0]).toBe(false);
    });

    it("treats a missing test list as empty", () => {
        expect(parseTask({ train: [] })).toEqual({ train: [], test: [] });
    });

    it("returns a copy of the grids", () => {
        const input = [[1]];
        const task = parseTask({ train: [{ input, output: [[0]] }] });

        input[0][0] = 7;

        expect(task.train[0].input).toEqual([[1]]);
    });

    it.each([
        [null, "Task must be an object."],
        [[], "Task must be an object."],
        [{ test: [] }, "Task must contain 'train' key."],
        [{ train: {} }, "'train' must be a list."],
        [{ train: [], test: "none" }, "'test' must be a list."],
        [{ train: [3] }, "Train example 0 must be an object."],
        [{ train: [{ input: [[1]] }] }, "Train example 0 must contain 'input' and 'output' keys."],
        [{ train: [], test: [{ output: [[1]] }] }, "Test example 0 must contain 'input' key."],
    ])("rejects %j", (data, message) => {
        expect(() => parseTask(data)).toThrow(message);
    });

    it("names the grid that is malformed", () => {
        expect(() =>
            parseTask({
                train: [
                    { input: [[1]], output: [[1]] },
                    { input: [[1]], output: [[1, 2], [3]] },
                ],
            }),
        ).toThrow("Train example 1 output has ragged rows: row 1 has length 1, expected 2.");

        expect(() => parseTask({ train: [], test: [{ input: [[1, "2"]] }] })).toThrow(
            "Test example 0 input contains invalid value 2 at position (1, 0).",
        );

        expect(() => parseTask({ train: [{ input: "grid", output: [[1]] }] })).toThrow(
            "Train example 0 input must be a list.",
        );

        expect(() => parseTask({ train: [{ input: [1, 2], output: [[1]] }] })).toThrow(
            "Train example 0 input must be a list of lists.",
        );
    });

    it("validates against the task limits by default", () => {
        const wide = [new Array<number>(31).fill(0)];
        expect(() => parseTask({ train: [{ input: wide, output: [[0]] }] })).toThrow(
            "Train example 0 input dimensions cannot exceed 30×30, got 31×1.",
        );
        expect(parseTask({ train: [{ input: wide, output: [[0]] }] }, GridLimits.DEFAULT).train).toHaveLength(1);
    });

    it("accepts extended colors with extended limits", () => {
        const data = { train: [{ input: [[15]], output: [[10]] }] };
        expect(() => parseTask(data)).toThrow(ValidationError);
        expect(parseTask(data, GridLimits.EXTENDED).train[0].input).toEqual([[15]]);
    });
});

describe("task builders", () => {
    it("creates an empty task", () => {
        expect(createEmptyTask()).toEqual({ train: [], test: [] });
    });

    it("appends validated copies of the grids", () => {
        const task = createEmptyTask();
        const grid = [[1, 1]];

        addTrainExample(task, grid, [[2, 2]]);
        addTestExample(task, grid);
        addTestExample(task, [[3]], [[4]]);
        grid[0][0] = 9;

        expect(task).toEqual({
            train: [{ input: [[1, 1]], output: [[2, 2]] }],
            test: [{ input: [[1, 1]] }, { input: [[3]], output: [[4]] }],
        });
    });

    it("rejects invalid grids", () => {
        const task = createEmptyTask();
        expect(() => addTrainExample(task, [[1]], [[10]])).toThrow(
            "Output grid contains invalid value 10 at position (0, 0).",
        );
        expect(() => validateGridData([], "Input grid")).toThrow("Input grid cannot be empty.");
        expect(task.train).toEqual([]);
    });
});
