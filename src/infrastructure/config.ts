//
//
//

import commandLineArgs from "command-line-args";

import { ValidationError } from "src/domain/errors";
import { GridLimits, Palette, TaskSplit } from "src/domain/models";
import { LogLevel, isLogLevel } from "src/utils";

export type GridSide = "input" | "output";

export interface AppConfig {
    readonly limits: GridLimits;

    readonly palette: Palette;

    readonly logLevel: LogLevel;
}

/**
 * The arguments of a single command. Options the command does not take are
 * ignored; missing ones are null.
 */
export interface CommandOptions {
    readonly command: string | null;

    readonly file: string | null;

    readonly split: TaskSplit;

    readonly example: number;

    readonly side: GridSide;

    readonly x: number | null;

    readonly y: number | null;

    readonly color: number | null;

    readonly width: number | null;

    readonly height: number | null;
}

interface Option {
    readonly name: string;
    readonly type: NumberConstructor | StringConstructor;
    readonly alias?: string;
    readonly defaultOption?: boolean;
    // whether the option can also be set through an environment variable
    readonly env?: boolean;
}

const OPTIONS: Option[] = [
    { name: "command", type: String, defaultOption: true },
    { name: "file", alias: "f", type: String },
    { name: "split", type: String },
    { name: "example", alias: "e", type: Number },
    { name: "side", type: String },
    { name: "x", type: Number },
    { name: "y", type: Number },
    { name: "color", alias: "c", type: Number },
    { name: "width", alias: "w", type: Number },
    { name: "height", alias: "h", type: Number },
    { name: "max-width", type: Number, env: true },
    { name: "max-height", type: Number, env: true },
    { name: "palette", type: String, env: true },
    { name: "log-level", type: String, env: true },
];

const DEFAULT_VALUES = new Map<string, string | number>([
    ["max-width", 64],
    ["max-height", 64],
    ["palette", "base"],
    ["log-level", "info"],
    ["split", "train"],
    ["example", 0],
    ["side", "input"],
]);

function readNumber(config: Map<string, string | number>, name: string): number | null {
    const value = config.get(name);
    if (value === undefined) {
        return null;
    }

    const number = typeof value === "number" ? value : Number(value);
    if (!Number.isInteger(number)) {
        throw new ValidationError(`Option --${name} must be an integer, got ${value}.`);
    }

    return number;
}

function readString(config: Map<string, string | number>, name: string): string | null {
    const value = config.get(name);
    return value === undefined ? null : String(value);
}

function readPalette(name: string | null): Palette {
    switch (name) {
        case "base":
            return Palette.BASE;
        case "extended":
            return Palette.EXTENDED;
        default:
            throw new ValidationError(`Unknown palette: ${name}. Expected base or extended.`);
    }
}

/**
 * Builds the configuration from the environment and the command line. Command
 * line arguments take precedence over environment variables, which take
 * precedence over the defaults.
 * @param argv The command line arguments, without the node executable and the script.
 * @param env The environment variables.
 */
export function getConfig(argv: string[], env: NodeJS.ProcessEnv): [AppConfig, CommandOptions] {
    const config = new Map<string, string | number>();

    // first check if the corresponding environment variables are set
    for (const option of OPTIONS) {
        if (!option.env) {
            continue;
        }

        const varName = option.name.toUpperCase().replace(/-/g, "_");
        const value = env[varName];
        if (value !== undefined && value !== "") {
            config.set(option.name, option.type(value));
        }
    }

    // then parse the command line arguments
    const cliArgs: Record<string, unknown> = commandLineArgs(OPTIONS, { argv });
    for (const [name, value] of Object.entries(cliArgs)) {
        if (typeof value === "string" || typeof value === "number") {
            config.set(name, value);
        }
    }

    for (const [name, value] of DEFAULT_VALUES) {
        if (!config.has(name)) {
            config.set(name, value);
        }
    }

    const palette = readPalette(readString(config, "palette"));
    const logLevel = readString(config, "log-level") ?? "info";
    if (!isLogLevel(logLevel)) {
        throw new ValidationError(`Unknown log level: ${logLevel}.`);
    }

    const split = readString(config, "split");
    if (split !== "train" && split !== "test") {
        throw new ValidationError(`Option --split must be train or test, got ${split}.`);
    }
    const side = readString(config, "side");
    if (side !== "input" && side !== "output") {
        throw new ValidationError(`Option --side must be input or output, got ${side}.`);
    }

    const appConfig: AppConfig = {
        limits: GridLimits.new(
            readNumber(config, "max-width") ?? 64,
            readNumber(config, "max-height") ?? 64,
            palette.maxColor,
        ),
        palette,
        logLevel,
    };

    const options: CommandOptions = {
        command: readString(config, "command"),
        file: readString(config, "file"),
        split,
        example: readNumber(config, "example") ?? 0,
        side,
        x: readNumber(config, "x"),
        y: readNumber(config, "y"),
        color: readNumber(config, "color"),
        width: readNumber(config, "width"),
        height: readNumber(config, "height"),
    };

    return [appConfig, options];
}
