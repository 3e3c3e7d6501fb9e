//
//
//

import { HashSet } from "src/utils";
import { OutOfBoundsError, ValidationError } from "../errors";
import { GridLimits } from "./limits";
import { Position } from "./location";

/**
 * The plain nested-array form of a grid, indexed `[row][column]`.
 */
export type GridData = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Validates an untrusted nested array against the given limits and returns a
 * deep copy of it.
 * @param data The value to validate.
 * @param limits The bounds the grid must respect.
 * @param context Prefix used in error messages (e.g. "Train example 0 input").
 */
export function parseGridData(data: unknown, limits: GridLimits, context = "Grid data"): number[][] {
    if (!Array.isArray(data)) {
        throw new ValidationError(`${context} must be a list.`);
    }
    if (data.length === 0) {
        throw new ValidationError(`${context} cannot be empty.`);
    }

    const rows: unknown[][] = [];
    for (const row of data) {
        if (!Array.isArray(row)) {
            throw new ValidationError(`${context} must be a list of lists.`);
        }
        rows.push(row);
    }

    const height = rows.length;
    const width = rows[0].length;
    if (width === 0) {
        throw new ValidationError(`${context} rows cannot be empty.`);
    }

    rows.forEach((row, y) => {
        if (row.length !== width) {
            throw new ValidationError(
                `${context} has ragged rows: row ${y} has length ${row.length}, expected ${width}.`,
            );
        }
    });

    if (width > limits.maxWidth || height > limits.maxHeight) {
        throw new ValidationError(
            `${context} dimensions cannot exceed ${limits.maxWidth}×${limits.maxHeight}, got ${width}×${height}.`,
        );
    }

    return rows.map((row, y) => {
        const cells: number[] = [];
        // indexed so that holes in sparse rows are checked too
        for (let x = 0; x < width; x += 1) {
            const value = row[x];
            if (!limits.isValidColor(value)) {
                throw new ValidationError(
                    `${context} contains invalid value ${String(value)} at position (${x}, ${y}).`,
                );
            }
            cells.push(value);
        }

        return cells;
    });
}

/**
 * Grid is a bounded, rectangular matrix of colors.
 *
 * Coordinates are given as `(x, y)`, where `x` is the column and `y` the row.
 * Every cell always holds a color in `[0, limits.maxColor]` and the grid is
 * never larger than `limits.maxWidth × limits.maxHeight`.
 */
export class Grid {
    public readonly limits: GridLimits;

    private _width: number;

    private _height: number;

    private _cells: number[][];

    // ------------------------------------------------------------------------
    // Constructors
    // ------------------------------------------------------------------------

    public constructor(width: number, height: number, fill = 0, limits = GridLimits.DEFAULT) {
        limits.checkDimensions(width, height);
        limits.checkColor(fill, "Fill value");

        this.limits = limits;
        this._width = width;
        this._height = height;
        this._cells = Grid._allocate(width, height, fill);
    }

    public static fromList(data: GridData, limits = GridLimits.DEFAULT): Grid {
        const grid = new Grid(1, 1, 0, limits);
        grid.fromList(data);
        return grid;
    }

    // ------------------------------------------------------------------------
    // Accessors
    // ------------------------------------------------------------------------

    public get width(): number {
        return this._width;
    }

    public get height(): number {
        return this._height;
    }

    public isInBounds(x: number, y: number): boolean {
        return (
            Number.isInteger(x) &&
            Number.isInteger(y) &&
            x >= 0 &&
            x < this._width &&
            y >= 0 &&
            y < this._height
        );
    }

    /**
     * Returns the color at `(x, y)`.
     * @throws OutOfBoundsError if the coordinates are outside the grid.
     */
    public get(x: number, y: number): number {
        this._checkBounds(x, y);
        return this._cells[y][x];
    }

    /**
     * Overwrites the color at `(x, y)`.
     * @throws OutOfBoundsError if the coordinates are outside the grid.
     * @throws ValidationError if the value is not a valid color.
     */
    public set(x: number, y: number, value: number): void {
        this._checkBounds(x, y);
        this.limits.checkColor(value);
        this._cells[y][x] = value;
    }

    // ------------------------------------------------------------------------
    // Whole-grid operations
    // ------------------------------------------------------------------------

    /**
     * Changes the dimensions of the grid. Cells inside both the old and the
     * new extent keep their color, new cells get `fill` and cells outside the
     * new extent are discarded.
     */
    public resize(width: number, height: number, fill = 0): void {
        this.limits.checkDimensions(width, height);
        this.limits.checkColor(fill, "Fill value");

        const cells = Grid._allocate(width, height, fill);
        const rows = Math.min(height, this._height);
        const columns = Math.min(width, this._width);
        for (let y = 0; y < rows; y += 1) {
            for (let x = 0; x < columns; x += 1) {
                cells[y][x] = this._cells[y][x];
            }
        }

        this._width = width;
        this._height = height;
        this._cells = cells;
    }

    public fill(color: number): void {
        this.limits.checkColor(color, "Color");
        for (const row of this._cells) {
            row.fill(color);
        }
    }

    public clone(): Grid {
        const clone = new Grid(this._width, this._height, 0, this.limits);
        clone._cells = this._cells.map((row) => row.slice());
        return clone;
    }

    /**
     * Recolors the 4-connected region of same-colored cells containing
     * `(x, y)`. Off-grid starting points, whatever the color, and fills with
     * the color the region already has leave the grid untouched.
     * @returns the positions whose color changed, in the order they were filled.
     * @throws ValidationError if the start is on the grid and the color is not valid.
     */
    public floodFill(x: number, y: number, color: number): Position[] {
        if (!this.isInBounds(x, y)) {
            return [];
        }
        this.limits.checkColor(color, "Color");

        const original = this._cells[y][x];
        if (original === color) {
            return [];
        }

        const changed: Position[] = [];
        const visited = new HashSet<Position>();
        const stack: Position[] = [new Position(x, y)];

        while (stack.length > 0) {
            const position = stack.pop();
            if (position === undefined) {
                break;
            }

            if (
                visited.has(position) ||
                !position.isValid(this._width, this._height) ||
                this._cells[position.y][position.x] !== original
            ) {
                continue;
            }

            visited.add(position);
            this._cells[position.y][position.x] = color;
            changed.push(position);

            stack.push(...position.neighbours());
        }

        return changed;
    }

    public isUniform(): boolean {
        const first = this._cells[0][0];
        return this._cells.every((row) => row.every((value) => value === first));
    }

    public equals(other: Grid): boolean {
        if (this._width !== other._width || this._height !== other._height) {
            return false;
        }

        return this._cells.every((row, y) => row.every((value, x) => value === other._cells[y][x]));
    }

    // ------------------------------------------------------------------------
    // Conversion
    // ------------------------------------------------------------------------

    public toList(): number[][] {
        return this._cells.map((row) => row.slice());
    }

    /**
     * Replaces the dimensions and the content of the grid with `data`.
     * Unlike `resize`, nothing of the previous content is kept.
     * @throws ValidationError if `data` is empty, ragged, too large or holds
     * invalid colors. The grid is left unchanged in that case.
     */
    public fromList(data: GridData): void {
        const cells = parseGridData(data, this.limits);

        this._height = cells.length;
        this._width = cells[0].length;
        this._cells = cells;
    }

    public describe(): string {
        return `Grid(${this._width}×${this._height})`;
    }

    public toString(): string {
        return this._cells.map((row) => row.join(" ")).join("\n");
    }

    // ------------------------------------------------------------------------
    // Private methods
    // ------------------------------------------------------------------------

    private _checkBounds(x: number, y: number): void {
        if (!this.isInBounds(x, y)) {
            throw new OutOfBoundsError(x, y, this._width, this._height);
        }
    }

    private static _allocate(width: number, height: number, fill: number): number[][] {
        return Array.from({ length: height }, () => new Array<number>(width).fill(fill));
    }
}
