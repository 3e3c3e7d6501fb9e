//
//
//

import { Hashable } from "src/utils";

// ---------------------------------------------------------------------------
// Direction
// ---------------------------------------------------------------------------

export enum Direction {
    UP = "up",
    DOWN = "down",
    LEFT = "left",
    RIGHT = "right",
}

// ---------------------------------------------------------------------------
// Position
// ---------------------------------------------------------------------------

/**
 * A cell coordinate. `x` is the column and `y` the row; `y` grows downwards.
 */
export class Position implements Hashable {
    public constructor(
        public readonly x: number,
        public readonly y: number,
    ) {}

    public moveTo(direction: Direction): Position {
        switch (direction) {
            case Direction.UP:
                return new Position(this.x, this.y - 1);
            case Direction.DOWN:
                return new Position(this.x, this.y + 1);
            case Direction.LEFT:
                return new Position(this.x - 1, this.y);
            case Direction.RIGHT:
                return new Position(this.x + 1, this.y);
            default:
                // this should never happen
                throw new Error(`Unknown direction: ${direction}`);
        }
    }

    /**
     * Returns the four axis-aligned neighbours of this position. They are not
     * filtered by any grid extent, so some of them may be off-grid.
     */
    public neighbours(): Position[] {
        return [
            this.moveTo(Direction.RIGHT),
            this.moveTo(Direction.LEFT),
            this.moveTo(Direction.DOWN),
            this.moveTo(Direction.UP),
        ];
    }

    public isValid(width: number, height: number): boolean {
        return this.x >= 0 && this.x < width && this.y >= 0 && this.y < height;
    }

    public hash(): string {
        return `${this.x},${this.y}`;
    }
}
