import { describe, it, expect } from "vitest";

import { ValidationError } from "src/domain/errors";
import { Palette } from "src/domain/models";
import { getConfig } from "./config";

describe("getConfig", () => {
    it("uses the defaults when nothing is set", () => {
        const [config, options] = getConfig([], {});

        expect(config.limits.toString()).toBe("64×64, colors 0-9");
        expect(config.palette).toBe(Palette.BASE);
        expect(config.logLevel).toBe("info");
        expect(options).toEqual({
            command: null,
            file: null,
            split: "train",
            example: 0,
            side: "input",
            x: null,
            y: null,
            color: null,
            width: null,
            height: null,
        });
    });

    it("reads the environment", () => {
        const [config] = getConfig([], {
            MAX_WIDTH: "30",
            PALETTE: "extended",
            LOG_LEVEL: "debug",
        });

        expect(config.limits.toString()).toBe("30×64, colors 0-15");
        expect(config.palette).toBe(Palette.EXTENDED);
        expect(config.logLevel).toBe("debug");
    });

    it("lets the command line override the environment", () => {
        const [config] = getConfig(["--max-width", "20", "--palette", "base"], {
            MAX_WIDTH: "30",
            PALETTE: "extended",
        });

        expect(config.limits.toString()).toBe("20×64, colors 0-9");
    });

    it("only reads configuration options from the environment", () => {
        const [, options] = getConfig([], { FILE: "task.json", X: "1" });

        expect(options.file).toBeNull();
        expect(options.x).toBeNull();
    });

    it("parses the command and its arguments", () => {
        const [, options] = getConfig(
            ["fill", "--file", "task.json", "--x", "1", "--y", "2", "-c", "3"],
            {},
        );

        expect(options.command).toBe("fill");
        expect(options.file).toBe("task.json");
        expect(options.x).toBe(1);
        expect(options.y).toBe(2);
        expect(options.color).toBe(3);
    });

    it("selects a grid of a task", () => {
        const [, options] = getConfig(
            ["show", "-f", "task.json", "--split", "test", "--example", "2", "--side", "output"],
            {},
        );

        expect(options.split).toBe("test");
        expect(options.example).toBe(2);
        expect(options.side).toBe("output");
    });

    it("rejects invalid values", () => {
        expect(() => getConfig(["--palette", "neon"], {})).toThrow(
            "Unknown palette: neon. Expected base or extended.",
        );
        expect(() => getConfig([], { MAX_WIDTH: "wide" })).toThrow(
            "Option --max-width must be an integer, got NaN.",
        );
        expect(() => getConfig([], { MAX_HEIGHT: "0" })).toThrow(ValidationError);
        expect(() => getConfig(["--split", "validation"], {})).toThrow(
            "Option --split must be train or test, got validation.",
        );
        expect(() => getConfig([], { LOG_LEVEL: "verbose" })).toThrow("Unknown log level: verbose.");
    });
});
