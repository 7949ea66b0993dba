import cron, { type ScheduledTask } from 'node-cron';
import type { DeliveryReport } from '../db/randomness.js';
import type { GachaServices } from '../services.js';

export function drainRandomness(services: Pick<GachaServices, 'coordinator' | 'engine'>): DeliveryReport {
    const { coordinator, engine } = services;
    const pending = coordinator.pending().length;
    if (pending === 0) {
        return { delivered: [], failed: [] };
    }

    console.log(`[${new Date().toISOString()}] Delivering ${pending} pending randomness request(s)...`);
    const report = coordinator.deliverPending(engine);
    if (report.failed.length > 0) {
        console.error(`Delivered ${report.delivered.length}, ${report.failed.length} left pending for the next run`);
    }
    return report;
}

export function startFulfiller(services: Pick<GachaServices, 'coordinator' | 'engine'>, expression: string): ScheduledTask {
    if (!cron.validate(expression)) {
        throw new Error(`Invalid FULFILL_CRON expression: ${expression}`);
    }
    const task = cron.schedule(expression, () => {
        drainRandomness(services);
    });
    console.log(`Randomness fulfiller started (${expression})`);
    return task;
}
