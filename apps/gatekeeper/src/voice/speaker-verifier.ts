import type { EmbeddingVector, EnrolledVoiceprint, VerificationResult } from '@voicegate/shared';
import { ExtractionError } from '../lib/errors.js';

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
        throw new ExtractionError('Embeddings must have the same length', {
            live: a.length,
            enrolled: b.length,
        });
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface SpeakerVerifierOptions {
    /** Minimum cosine similarity accepted as the owner. Required. */
    threshold: number;
}

export class SpeakerVerifier {
    readonly threshold: number;

    constructor(options: SpeakerVerifierOptions) {
        const { threshold } = options;
        if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
            throw new RangeError('SpeakerVerifier requires an explicit threshold between 0 and 1');
        }
        this.threshold = threshold;
    }

    verify(live: EmbeddingVector, enrolled: EnrolledVoiceprint): VerificationResult {
        const confidence = cosineSimilarity(live, enrolled.embedding);
        return {
            verified: confidence >= this.threshold,
            confidence,
            ownerId: enrolled.ownerId,
        };
    }
}
