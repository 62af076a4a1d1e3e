import { describe, expect, test, vi } from 'vitest';
import { LowConfidenceError } from '../lib/errors.js';
import { MetricsCollector } from '../lib/metrics.js';
import { AsrRouter, type Transcriber, type Transcription } from './asr.js';

function fixed(result: Transcription) {
    const transcribe = vi.fn(async () => result);
    const transcriber: Transcriber = { transcribe };
    return { transcriber, transcribe };
}

describe('AsrRouter', () => {
    test('keeps a confident local result without calling the cloud', async () => {
        const local = fixed({ text: 'call mom', confidence: 0.9, source: 'local' });
        const cloud = fixed({ text: 'call mom', confidence: 0.95, source: 'cloud' });
        const metrics = new MetricsCollector();

        const result = await new AsrRouter(local.transcriber, cloud.transcriber, { threshold: 0.7 }, metrics).transcribe(
            [],
            16000,
            100
        );

        expect(result.source).toBe('local');
        expect(cloud.transcribe).not.toHaveBeenCalled();
        expect(metrics.counter('asr.calls')).toBe(1);
    });

    test('falls back to the cloud below the threshold', async () => {
        const local = fixed({ text: 'cool mom', confidence: 0.4, source: 'local' });
        const cloud = fixed({ text: 'call mom', confidence: 0.92, source: 'cloud' });

        const result = await new AsrRouter(local.transcriber, cloud.transcriber, { threshold: 0.7 }).transcribe([], 16000, 100);
        expect(result).toEqual({ text: 'call mom', confidence: 0.92, source: 'cloud' });
    });

    test('returns the better weak result unless confidence is required', async () => {
        const local = fixed({ text: 'cool mom', confidence: 0.5, source: 'local' });
        const cloud = fixed({ text: 'coal mom', confidence: 0.3, source: 'cloud' });

        const lenient = new AsrRouter(local.transcriber, cloud.transcriber, { threshold: 0.7 });
        await expect(lenient.transcribe([], 16000, 100)).resolves.toMatchObject({ source: 'local' });

        const strict = new AsrRouter(local.transcriber, cloud.transcriber, { threshold: 0.7, requireConfidence: true });
        await expect(strict.transcribe([], 16000, 100)).rejects.toBeInstanceOf(LowConfidenceError);
    });
});
