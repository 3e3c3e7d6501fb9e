//
//
//

import EventEmitter from "eventemitter3";
import { Logger } from "winston";

import { ValidationError } from "src/domain/errors";
import {
    Grid,
    GridLimits,
    Palette,
    Position,
    Task,
    addTrainExample,
    createEmptyTask,
} from "src/domain/models";
import { TaskRepository } from "src/domain/ports";

export enum Tool {
    PAINT = "paint",
    FILL = "fill",
}

export interface EditorSessionOptions {
    readonly repository: TaskRepository;

    readonly logger: Logger;

    readonly limits?: GridLimits;

    readonly palette?: Palette;

    readonly width?: number;

    readonly height?: number;
}

/**
 * EditorSession holds the grid being edited together with the tool and the
 * color applied to it, and the task the grid is saved into.
 */
export class EditorSession {
    private static readonly CELLS_CHANGE_EVENT = "cells-change";

    private static readonly GRID_CHANGE_EVENT = "grid-change";

    public static readonly DEFAULT_SIZE = 8;

    public readonly palette: Palette;

    public readonly limits: GridLimits;

    private _grid: Grid;

    private _task: Task = createEmptyTask();

    private _path: string | null = null;

    private _color = 0;

    private _tool: Tool = Tool.PAINT;

    private _dirty = false;

    // bumped by every edit of the grid
    private _revision = 0;

    private readonly _repository: TaskRepository;

    private readonly _logger: Logger;

    private readonly _broker: EventEmitter = new EventEmitter();

    public constructor(options: EditorSessionOptions) {
        this.limits = options.limits ?? GridLimits.DEFAULT;
        this.palette = options.palette ?? Palette.forLimits(this.limits);
        if (this.palette.maxColor < this.limits.maxColor) {
            throw new ValidationError(
                `Palette ${this.palette.name} cannot display colors up to ${this.limits.maxColor}.`,
            );
        }

        this._repository = options.repository;
        this._logger = options.logger;
        this._grid = new Grid(
            options.width ?? EditorSession.DEFAULT_SIZE,
            options.height ?? EditorSession.DEFAULT_SIZE,
            0,
            this.limits,
        );
    }

    // ------------------------------------------------------------------------
    // Getters
    // ------------------------------------------------------------------------

    public get grid(): Grid {
        return this._grid;
    }

    public get task(): Task {
        return this._task;
    }

    public get path(): string | null {
        return this._path;
    }

    public get color(): number {
        return this._color;
    }

    public get tool(): Tool {
        return this._tool;
    }

    public get hasUnsavedChanges(): boolean {
        return this._dirty;
    }

    public status(): string {
        const tool = this._tool.charAt(0).toUpperCase() + this._tool.slice(1);
        return `${tool} | Color ${this._color} | Grid ${this._grid.width}×${this._grid.height}`;
    }

    // ------------------------------------------------------------------------
    // Tools
    // ------------------------------------------------------------------------

    public selectColor(color: number): void {
        this.limits.checkColor(color, "Color");
        this._color = color;
    }

    public selectTool(tool: Tool): void {
        this._tool = tool;
    }

    /**
     * Applies the current tool with the current color at `(x, y)`. Positions
     * outside the grid are ignored.
     * @returns the positions whose color changed.
     */
    public applyAt(x: number, y: number): Position[] {
        if (!this._grid.isInBounds(x, y)) {
            this._logger.debug(`Ignoring ${this._tool} outside the grid at (${x}, ${y}).`);
            return [];
        }

        let changed: Position[];
        switch (this._tool) {
            case Tool.PAINT: {
                changed = [];
                if (this._grid.get(x, y) !== this._color) {
                    this._grid.set(x, y, this._color);
                    changed.push(new Position(x, y));
                }
                break;
            }
            case Tool.FILL: {
                changed = this._grid.floodFill(x, y, this._color);
                break;
            }
            default:
                // this should never happen
                throw new Error(`Unknown tool: ${this._tool}`);
        }

        if (changed.length > 0) {
            this._dirty = true;
            this._revision += 1;
            this._logger.debug(`${this.status()}: ${changed.length} cell(s) changed at (${x}, ${y}).`);
            this._broker.emit(EditorSession.CELLS_CHANGE_EVENT, changed);
        }

        return changed;
    }

    public clear(): void {
        this._grid.fill(0);
        this._gridChanged();
    }

    public resize(width: number, height: number): void {
        this._grid.resize(width, height);
        this._logger.debug(`Grid resized to ${width}×${height}.`);
        this._gridChanged();
    }

    // ------------------------------------------------------------------------
    // Task files
    // ------------------------------------------------------------------------

    public newTask(width = EditorSession.DEFAULT_SIZE, height = EditorSession.DEFAULT_SIZE): void {
        const grid = new Grid(width, height, 0, this.limits);

        this._grid = grid;
        this._task = createEmptyTask();
        this._path = null;
        this._dirty = false;
        this._broker.emit(EditorSession.GRID_CHANGE_EVENT, this._grid);
    }

    /**
     * Loads a task and puts the input of its first training example in the
     * grid. The grid is left as it is when the task has no training example.
     */
    public async open(path: string): Promise<void> {
        const task = await this._repository.load(path);

        const first = task.train.length > 0 ? task.train[0] : undefined;
        if (first !== undefined) {
            this._grid = Grid.fromList(first.input, this.limits);
        }

        this._task = task;
        this._path = path;
        this._dirty = false;
        this._broker.emit(EditorSession.GRID_CHANGE_EVENT, this._grid);
    }

    /**
     * Stores the grid as the input of the first training example and saves
     * the task. When the task has no training example yet, one is added with
     * the grid as both input and output. The session's task is updated only
     * once the write succeeded, and edits made while it was in flight keep the
     * session dirty.
     * @param path where to save; defaults to the path the task was opened from.
     */
    public async save(path?: string): Promise<void> {
        const target = path ?? this._path;
        if (target === null) {
            throw new ValidationError("No file to save to.");
        }

        // the grid may keep changing while the task is written
        const task = this._task;
        const revision = this._revision;
        const snapshot = this._grid.toList();

        const updated: Task = { train: [...task.train], test: [...task.test] };
        const first = updated.train.length > 0 ? updated.train[0] : undefined;
        if (first === undefined) {
            addTrainExample(updated, snapshot, snapshot, this.limits);
        } else {
            updated.train[0] = { ...first, input: snapshot };
        }

        await this._repository.save(updated, target);

        if (this._task !== task) {
            // another task was opened or created during the write
            return;
        }

        this._task = updated;
        this._path = target;
        if (this._revision === revision) {
            this._dirty = false;
        }
    }

    // ------------------------------------------------------------------------
    // Event listeners
    // ------------------------------------------------------------------------

    public onCellsChange(callback: (positions: Position[]) => void): void {
        this._broker.on(EditorSession.CELLS_CHANGE_EVENT, callback);
    }

    public onGridChange(callback: (grid: Grid) => void): void {
        this._broker.on(EditorSession.GRID_CHANGE_EVENT, callback);
    }

    // ------------------------------------------------------------------------
    // Private methods
    // ------------------------------------------------------------------------

    private _gridChanged(): void {
        this._dirty = true;
        this._revision += 1;
        this._broker.emit(EditorSession.GRID_CHANGE_EVENT, this._grid);
    }
}
