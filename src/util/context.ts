import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

interface RunContext {
    runId?: string;
}

export const runContext = new AsyncLocalStorage<RunContext>();

export function getRunId(): string | undefined {
    const store = runContext.getStore();
    return store?.runId;
}

export function runWithRunId<T>(runId: string, callback: () => T): T {
    return runContext.run({ runId }, callback);
}

export function createRunId(): string {
    return randomUUID().slice(0, 8);
}
