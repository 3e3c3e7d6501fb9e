//
//
//

export { Grid, parseGridData } from "./grid";
export type { GridData } from "./grid";
export { GridLimits, MAX_PALETTE_COLOR } from "./limits";
export { Position } from "./location";
export { Palette } from "./palette";
export type { PaletteEntry, RGB } from "./palette";
export {
    addTestExample,
    addTrainExample,
    createEmptyTask,
    parseTask,
    validateGridData,
} from "./task";
export type { Task, TaskSplit, TestExample, TrainExample } from "./task";
