import type { AudioFrame } from '@voicegate/shared';
import { LowConfidenceError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MetricsSink } from '../lib/metrics.js';
import { withTimeout } from '../lib/timeout.js';

export interface Transcription {
    text: string;
    confidence: number;
    source: string;
}

export interface Transcriber {
    transcribe(frames: readonly AudioFrame[], sampleRate: number, timeoutMs: number): Promise<Transcription>;
}

export interface AsrRouterOptions {
    /** Local results at or above this confidence skip the cloud call. */
    threshold: number;
    /** Fail with LowConfidence instead of returning a weak fallback result. */
    requireConfidence?: boolean;
}

/**
 * Local-first transcription with a cloud fallback when the local engine is
 * unsure. Each engine call runs under the caller's timeout.
 */
export class AsrRouter implements Transcriber {
    constructor(
        private readonly local: Transcriber,
        private readonly cloud: Transcriber,
        private readonly options: AsrRouterOptions,
        private readonly metrics?: MetricsSink,
        private readonly logger?: Logger
    ) {}

    async transcribe(frames: readonly AudioFrame[], sampleRate: number, timeoutMs: number): Promise<Transcription> {
        const local = await withTimeout('local transcription', timeoutMs, () =>
            this.local.transcribe(frames, sampleRate, timeoutMs)
        );
        this.metrics?.record('asr.calls', 1, { source: local.source });
        if (local.confidence >= this.options.threshold) {
            return local;
        }

        this.logger?.debug(
            { confidence: local.confidence, threshold: this.options.threshold },
            'Local transcription below threshold, falling back to cloud'
        );
        const cloud = await withTimeout('cloud transcription', timeoutMs, () =>
            this.cloud.transcribe(frames, sampleRate, timeoutMs)
        );
        this.metrics?.record('asr.calls', 1, { source: cloud.source });

        if (cloud.confidence >= this.options.threshold) {
            return cloud;
        }
        if (this.options.requireConfidence) {
            throw new LowConfidenceError(Math.max(local.confidence, cloud.confidence), this.options.threshold);
        }
        return cloud.confidence >= local.confidence ? cloud : local;
    }
}
