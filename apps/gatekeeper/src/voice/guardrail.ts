import type { AudioFrame, GuardrailState } from '@voicegate/shared';
import type { GuardrailConfig } from '../config.js';
import { frameDurationMs, isSpeechFrame } from './audio.js';

export type GuardrailVerdict = 'pending' | 'passed' | 'rejected';

export interface FrameMeasurement {
    durationMs: number;
    speech: boolean;
}

export function emptyGuardrailState(): GuardrailState {
    return { speechMs: 0, silenceMs: 0 };
}

function normalizePhrase(text: string): string {
    return text.toLowerCase().replace(/[^a-z0-9\s]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Minimum-speech / maximum-silence checks applied to the audio that follows
 * a wake event, plus the optional spoken challenge phrase.
 */
export class AudioGuardrail {
    constructor(private readonly config: GuardrailConfig) {}

    get challengePhrase(): string | undefined {
        return this.config.challengePhrase;
    }

    measure(frame: AudioFrame): FrameMeasurement {
        return {
            durationMs: frameDurationMs(frame),
            speech: isSpeechFrame(frame, this.config.energyThreshold),
        };
    }

    accumulate(state: GuardrailState, measurement: FrameMeasurement): GuardrailState {
        return measurement.speech
            ? { speechMs: state.speechMs + measurement.durationMs, silenceMs: state.silenceMs }
            : { speechMs: state.speechMs, silenceMs: state.silenceMs + measurement.durationMs };
    }

    // Enough speech wins over silence seen on the way there.
    evaluate(state: GuardrailState): GuardrailVerdict {
        if (state.speechMs >= this.config.minSpeechMs) return 'passed';
        if (state.silenceMs > this.config.maxSilenceMs) return 'rejected';
        return 'pending';
    }

    matchesChallenge(transcript: string): boolean {
        const expected = this.config.challengePhrase;
        if (!expected) return true;
        const phrase = normalizePhrase(expected);
        return phrase.length > 0 && normalizePhrase(transcript).includes(phrase);
    }
}
