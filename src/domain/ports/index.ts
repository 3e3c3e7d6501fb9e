//
//
//

export type { TaskRepository } from "./repository";
