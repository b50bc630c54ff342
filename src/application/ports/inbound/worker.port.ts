/**
 * A background job run on a cron schedule, such as history retention
 */
export interface TaskPort {
    execute: () => Promise<void>;

    /**
     * Also run once as soon as the worker starts
     * @default false
     */
    executeOnStartup?: boolean;

    /**
     * Unique name, used in logs and to look the task up
     */
    name: string;

    /**
     * Cron expression, five or six fields
     */
    schedule: string;
}

/**
 * Schedules and stops the registered tasks
 */
export interface WorkerPort {
    /**
     * Schedule every registered task
     * @throws Error when a task carries an invalid cron expression
     */
    initialize(): Promise<void>;

    stop(): Promise<void>;
}
