//
//
//

export { COMMANDS, runCommand } from "./commands";
export { getConfig } from "./config";
export type { AppConfig, CommandOptions, GridSide } from "./config";
export { JsonFileTaskRepository } from "./repository";
