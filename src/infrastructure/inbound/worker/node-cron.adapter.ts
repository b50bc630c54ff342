import cron, { type ScheduledTask } from 'node-cron';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Application
import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';

export class NodeCronAdapter implements WorkerPort {
    private readonly scheduledTasks: ScheduledTask[] = [];

    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
    ) {}

    async initialize(): Promise<void> {
        this.logger.debug('Starting worker', { tasks: this.tasks.length });

        for (const task of this.tasks) {
            this.scheduleTask(task);
        }

        this.logger.debug('Worker initialization complete');
    }

    async stop(): Promise<void> {
        this.logger.info('Stopping worker', { runningTasks: this.scheduledTasks.length });

        for (const task of this.scheduledTasks) {
            task.stop();
        }

        this.scheduledTasks.length = 0;
        this.logger.info('Worker has stopped');
    }

    /**
     * Schedules one task. A failing run is logged and the schedule keeps going.
     */
    private scheduleTask(task: TaskPort): void {
        if (!cron.validate(task.schedule)) {
            throw new Error(`Invalid cron schedule for task ${task.name}: ${task.schedule}`);
        }

        this.logger.debug('Scheduling task', { schedule: task.schedule, task: task.name });

        const executeSafely = async (): Promise<void> => {
            const start = Date.now();
            this.logger.debug('Task started', { task: task.name });

            try {
                await task.execute();
                this.logger.info('Task completed successfully', {
                    durationMs: Date.now() - start,
                    task: task.name,
                });
            } catch (error) {
                this.logger.error('Task execution error', { error, task: task.name });
            }
        };

        const cronTask = cron.schedule(
            task.schedule,
            () => {
                void executeSafely();
            },
            { scheduled: false },
        );

        this.scheduledTasks.push(cronTask);

        if (task.executeOnStartup) {
            this.logger.debug('Executing startup task', { task: task.name });
            void executeSafely();
        }

        cronTask.start();
    }
}
