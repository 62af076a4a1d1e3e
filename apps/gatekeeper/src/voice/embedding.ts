import { createHash } from 'node:crypto';
import type { AudioFrame, EmbeddingVector } from '@voicegate/shared';
import { ExtractionError } from '../lib/errors.js';
import { frameDurationMs } from './audio.js';

export interface EmbeddingExtractor {
    readonly dimensions: number;
    extract(frames: readonly AudioFrame[], sampleRate: number): Promise<EmbeddingVector>;
}

export interface HashEmbeddingOptions {
    dimensions?: number;
    minDurationMs?: number;
}

/**
 * Dependency-free stand-in for a speaker embedding model: each frame is
 * hashed and the digest bytes are averaged into a fixed-length vector.
 * Identical audio always yields an identical vector. It carries no real
 * speaker information; plug a model-backed extractor in for production.
 */
export class HashEmbeddingExtractor implements EmbeddingExtractor {
    readonly dimensions: number;
    private readonly minDurationMs: number;

    constructor(options: HashEmbeddingOptions = {}) {
        this.dimensions = options.dimensions ?? 32;
        this.minDurationMs = options.minDurationMs ?? 0;
        if (this.dimensions < 1 || this.dimensions > 32) {
            throw new RangeError('HashEmbeddingExtractor supports 1 to 32 dimensions');
        }
    }

    async extract(frames: readonly AudioFrame[], sampleRate: number): Promise<EmbeddingVector> {
        const usable = frames.filter((frame) => frame.samples.length > 0);
        if (usable.length === 0) {
            throw new ExtractionError('Cannot extract an embedding from empty audio', { sampleRate });
        }

        const durationMs = usable.reduce((total, frame) => total + frameDurationMs(frame), 0);
        if (durationMs < this.minDurationMs) {
            throw new ExtractionError('Audio segment is too short for an embedding', {
                durationMs,
                minDurationMs: this.minDurationMs,
            });
        }

        const accum = new Array<number>(this.dimensions).fill(0);
        for (const frame of usable) {
            const bytes = Buffer.from(frame.samples.buffer, frame.samples.byteOffset, frame.samples.byteLength);
            const digest = createHash('sha256').update(bytes).digest();
            for (let i = 0; i < this.dimensions; i++) {
                accum[i] += digest[i];
            }
        }
        return accum.map((value) => value / usable.length);
    }
}
