/**
 * Per-stage spans for the utterance pipeline. Each finished span is kept in
 * a bounded window and also recorded as a `span.<name>_ms` latency.
 */

import type { MetricsSink } from './metrics.js';

export interface Span {
    name: string;
    startMs: number;
    durationMs: number;
    ok: boolean;
}

const SPAN_WINDOW = 1000;

export class TraceRecorder {
    private spans: Span[] = [];

    constructor(
        private readonly metrics?: MetricsSink,
        private readonly now: () => number = Date.now
    ) {}

    async span<T>(name: string, run: () => T | Promise<T>): Promise<T> {
        const startMs = this.now();
        let ok = false;
        try {
            const result = await run();
            ok = true;
            return result;
        } finally {
            const durationMs = this.now() - startMs;
            this.spans.push({ name, startMs, durationMs, ok });
            if (this.spans.length > SPAN_WINDOW) {
                this.spans.shift();
            }
            this.metrics?.record(`span.${name}_ms`, durationMs, { ok });
        }
    }

    export(): Span[] {
        return this.spans.map((span) => ({ ...span }));
    }

    reset(): void {
        this.spans = [];
    }
}
