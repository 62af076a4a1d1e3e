/**
 * Wake word detection capability.
 *
 * The listener only depends on `WakeDetector`. Two adapters are provided:
 * a score-based one for keyword-spotting engines that emit a per-frame
 * probability, and a transcript-based one that fuzzy-matches the output of a
 * streaming keyword spotter against the configured wake words.
 */

import type { AudioFrame, WakeEvent } from '@voicegate/shared';

export interface WakeDetector {
    process(frame: AudioFrame): WakeEvent | null;
}

export type FrameScorer = (frame: AudioFrame) => number;

/**
 * Adapter for engines that score every frame (e.g. a Porcupine or
 * openWakeWord binding). Scores of zero or below produce no event; the
 * listener applies its own threshold to the rest.
 */
export class ScoredWakeDetector implements WakeDetector {
    constructor(private readonly score: FrameScorer) {}

    process(frame: AudioFrame): WakeEvent | null {
        const confidence = this.score(frame);
        if (!Number.isFinite(confidence) || confidence <= 0) return null;
        return { confidence: Math.min(1, confidence), timestamp: frame.timestamp };
    }
}

export type KeywordSpotter = (frame: AudioFrame) => string | null;

export interface WakeWordMatch {
    phrase: string;
    wakeWord: string;
    confidence: number;
}

export function levenshteinDistance(a: string, b: string): number {
    let previous = Array.from({ length: a.length + 1 }, (_, j) => j);
    for (let i = 1; i <= b.length; i++) {
        const current = [i];
        for (let j = 1; j <= a.length; j++) {
            const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
            current[j] = Math.min(previous[j - 1] + cost, current[j - 1] + 1, previous[j] + 1);
        }
        previous = current;
    }
    return previous[a.length];
}

function similarity(a: string, b: string): number {
    const maxLength = Math.max(a.length, b.length);
    if (maxLength === 0) return 1;
    return 1 - levenshteinDistance(a, b) / maxLength;
}

function normalize(text: string): string {
    return text.toLowerCase().replace(/[^a-z0-9\s]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Best match of any wake word inside `transcript`: an exact substring
 * scores 1, otherwise the closest one- or two-word window by edit distance.
 */
export function matchWakeWord(transcript: string, wakeWords: readonly string[]): WakeWordMatch | null {
    const text = normalize(transcript);
    if (!text) return null;

    const words = wakeWords.map(normalize).filter((word) => word.length > 0);
    for (const wakeWord of words) {
        if (text.includes(wakeWord)) {
            return { phrase: wakeWord, wakeWord, confidence: 1 };
        }
    }

    const tokens = text.split(' ');
    const candidates = [...tokens];
    for (let i = 0; i < tokens.length - 1; i++) {
        candidates.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    let best: WakeWordMatch | null = null;
    for (const candidate of candidates) {
        for (const wakeWord of words) {
            const score = similarity(candidate, wakeWord);
            if (!best || score > best.confidence) {
                best = { phrase: candidate, wakeWord, confidence: score };
            }
        }
    }
    return best && best.confidence > 0 ? best : null;
}

export class TranscriptWakeDetector implements WakeDetector {
    constructor(
        private readonly spot: KeywordSpotter,
        private readonly wakeWords: readonly string[]
    ) {}

    process(frame: AudioFrame): WakeEvent | null {
        const text = this.spot(frame);
        if (!text) return null;

        const match = matchWakeWord(text, this.wakeWords);
        if (!match) return null;
        return { confidence: match.confidence, timestamp: frame.timestamp, phrase: match.phrase };
    }
}
