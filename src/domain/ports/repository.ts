//
//
//

import { Task } from "src/domain/models";

/**
 * Storage for task files.
 */
export interface TaskRepository {
    /**
     * Loads and validates a task.
     * @param path the location of the task.
     * @returns the validated task.
     */
    load(path: string): Promise<Task>;

    /**
     * Validates and stores a task, replacing whatever is stored at the same location.
     * @param task the task to store.
     * @param path the location of the task.
     */
    save(task: Task, path: string): Promise<void>;
}
