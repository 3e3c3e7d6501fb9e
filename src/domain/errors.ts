//
//
//

/**
 * Thrown when a dimension, a color or a piece of grid data is outside the
 * configured bounds or is malformed.
 */
export class ValidationError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = "ValidationError";
    }
}

/**
 * Thrown when a cell is accessed outside the current extent of a grid.
 */
export class OutOfBoundsError extends Error {
    public constructor(x: number, y: number, width: number, height: number) {
        super(`Coordinates (${x}, ${y}) out of bounds for ${width}×${height} grid.`);
        this.name = "OutOfBoundsError";
    }
}

/**
 * Thrown when a task file does not exist.
 */
export class TaskFileNotFoundError extends Error {
    public constructor(path: string) {
        super(`File not found: ${path}.`);
        this.name = "TaskFileNotFoundError";
    }
}

export class UnknownCommandError extends Error {
    public constructor(command: string) {
        super(`Unknown command: ${command}.`);
        this.name = "UnknownCommandError";
    }
}
