import { describe, expect, test, vi } from 'vitest';
import { ExtractionError, TimeoutError, UnverifiedError } from './errors.js';
import { retryTransient, withTimeout } from './timeout.js';

describe('withTimeout', () => {
    test('resolves with the call result', async () => {
        await expect(withTimeout('lookup', 50, async () => 'ok')).resolves.toBe('ok');
    });

    test('fails with TimeoutError when the call is too slow', async () => {
        const error = await withTimeout('lookup', 10, () => new Promise<string>(() => undefined)).catch(
            (caught: unknown) => caught
        );
        expect(error).toBeInstanceOf(TimeoutError);
        expect(error).toMatchObject({ code: 'TIMEOUT', message: 'lookup timed out after 10ms.' });
    });
});

describe('retryTransient', () => {
    test('retries a transient failure once', async () => {
        const run = vi
            .fn<[], Promise<number>>()
            .mockRejectedValueOnce(new ExtractionError('noisy'))
            .mockResolvedValueOnce(7);
        const onRetry = vi.fn();

        await expect(retryTransient(run, onRetry)).resolves.toBe(7);
        expect(run).toHaveBeenCalledTimes(2);
        expect(onRetry).toHaveBeenCalledTimes(1);
    });

    test('gives up after the second transient failure', async () => {
        const run = vi.fn<[], Promise<number>>().mockRejectedValue(new TimeoutError('embed', 5));
        await expect(retryTransient(run)).rejects.toBeInstanceOf(TimeoutError);
        expect(run).toHaveBeenCalledTimes(2);
    });

    test('does not retry security failures', async () => {
        const run = vi.fn<[], Promise<number>>().mockRejectedValue(new UnverifiedError('token missing'));
        await expect(retryTransient(run)).rejects.toBeInstanceOf(UnverifiedError);
        expect(run).toHaveBeenCalledTimes(1);
    });
});
