//
//
//

import { ValidationError } from "../errors";

/**
 * The largest color index any palette defines.
 */
export const MAX_PALETTE_COLOR = 15;

/**
 * GridLimits bounds the dimensions and the colors of a grid.
 */
export class GridLimits {
    public readonly maxWidth: number;

    public readonly maxHeight: number;

    public readonly maxColor: number;

    private constructor(maxWidth: number, maxHeight: number, maxColor: number) {
        this.maxWidth = maxWidth;
        this.maxHeight = maxHeight;
        this.maxColor = maxColor;
    }

    public static new(maxWidth: number, maxHeight: number, maxColor: number): GridLimits {
        if (!Number.isInteger(maxWidth) || maxWidth <= 0) {
            throw new ValidationError(`Maximum width must be a positive integer, got ${maxWidth}.`);
        }
        if (!Number.isInteger(maxHeight) || maxHeight <= 0) {
            throw new ValidationError(
                `Maximum height must be a positive integer, got ${maxHeight}.`,
            );
        }
        if (!Number.isInteger(maxColor) || maxColor < 0 || maxColor > MAX_PALETTE_COLOR) {
            throw new ValidationError(
                `Maximum color must be between 0-${MAX_PALETTE_COLOR}, got ${maxColor}.`,
            );
        }

        return new GridLimits(maxWidth, maxHeight, maxColor);
    }

    public isValidColor(value: unknown): value is number {
        return (
            typeof value === "number" &&
            Number.isInteger(value) &&
            value >= 0 &&
            value <= this.maxColor
        );
    }

    /**
     * Throws a ValidationError naming the violated bound if the dimensions
     * are not allowed.
     */
    public checkDimensions(width: number, height: number): void {
        if (!Number.isInteger(width) || !Number.isInteger(height)) {
            throw new ValidationError(`Grid dimensions must be integers, got ${width}×${height}.`);
        }
        if (width <= 0) {
            throw new ValidationError(`Grid width must be positive, got ${width}.`);
        }
        if (height <= 0) {
            throw new ValidationError(`Grid height must be positive, got ${height}.`);
        }
        if (width > this.maxWidth) {
            throw new ValidationError(
                `Grid width cannot exceed ${this.maxWidth}, got ${width}.`,
            );
        }
        if (height > this.maxHeight) {
            throw new ValidationError(
                `Grid height cannot exceed ${this.maxHeight}, got ${height}.`,
            );
        }
    }

    public checkColor(value: number, what = "Value"): void {
        if (!this.isValidColor(value)) {
            throw new ValidationError(`${what} ${value} must be between 0-${this.maxColor}.`);
        }
    }

    public toString(): string {
        return `${this.maxWidth}×${this.maxHeight}, colors 0-${this.maxColor}`;
    }
}

export namespace GridLimits {
    /** The editor bounds: up to 64×64 on the base palette. */
    export const DEFAULT = GridLimits.new(64, 64, 9);

    export const EXTENDED = GridLimits.new(64, 64, MAX_PALETTE_COLOR);

    /** The bounds task files are validated against. */
    export const TASK = GridLimits.new(30, 30, 9);
}
