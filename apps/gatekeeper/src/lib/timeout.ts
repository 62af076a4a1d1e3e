import { isGatekeeperError, TimeoutError } from './errors.js';

/**
 * Race a collaborator call against a timer. The timer is always cleared so a
 * settled call leaves nothing pending.
 */
export async function withTimeout<T>(operation: string, ms: number, run: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
    });

    try {
        return await Promise.race([run(), timeout]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

/**
 * Run once, and once more if the first attempt failed with a transient
 * gatekeeper error (timeout or extraction failure). Anything else propagates.
 */
export async function retryTransient<T>(
    run: () => Promise<T>,
    onRetry?: (error: unknown) => void
): Promise<T> {
    try {
        return await run();
    } catch (error) {
        if (!isGatekeeperError(error) || !error.transient) throw error;
        onRetry?.(error);
        return run();
    }
}
