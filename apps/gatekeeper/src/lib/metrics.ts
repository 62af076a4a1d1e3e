/**
 * Metrics sink for the gatekeeper
 *
 * Provides:
 * - Fire-and-forget `record(name, value, tags)` used by every component
 * - Counters and bounded latency windows
 * - Structured logging of each event through pino
 */

import type { MetricEvent, MetricTags } from '@voicegate/shared';
import type { Logger } from './logger.js';

export interface MetricsSink {
    record(name: string, value: number, tags?: MetricTags): void;
}

export interface MetricsSummary {
    counters: Record<string, number>;
    avgWakeToVerifyMs: number;
    avgRejectionLatencyMs: number;
    framesDropped: number;
    verifications: number;
    rejections: number;
    rejectionRate: number;
}

const LATENCY_WINDOW = 100;
const EVENT_WINDOW = 1000;

export class MetricsCollector implements MetricsSink {
    private events: MetricEvent[] = [];
    private counters = new Map<string, number>();
    private latencies = new Map<string, number[]>();

    constructor(private readonly logger?: Logger) {}

    // Never throws: a broken sink must not fail the pipeline.
    record(name: string, value: number, tags?: MetricTags): void {
        try {
            const event: MetricEvent = { name, value, timestamp: Date.now(), tags };
            this.events.push(event);
            if (this.events.length > EVENT_WINDOW) {
                this.events.shift();
            }

            if (name.endsWith('_ms')) {
                this.trackLatency(name, value);
            } else {
                this.counters.set(name, (this.counters.get(name) ?? 0) + value);
            }

            this.logger?.debug({ metric: event }, `[${name}]`);
        } catch (error) {
            this.logger?.warn({ error, metric: name }, 'Metric recording failed');
        }
    }

    private trackLatency(name: string, durationMs: number): void {
        const window = this.latencies.get(name) ?? [];
        window.push(durationMs);
        if (window.length > LATENCY_WINDOW) {
            window.shift();
        }
        this.latencies.set(name, window);
    }

    counter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    getAvgLatency(name: string): number {
        const window = this.latencies.get(name);
        if (!window || window.length === 0) return 0;
        return Math.round(window.reduce((a, b) => a + b, 0) / window.length);
    }

    recent(name?: string): MetricEvent[] {
        return name ? this.events.filter((event) => event.name === name) : [...this.events];
    }

    getSummary(): MetricsSummary {
        const verifications = this.counter('listener.verified');
        const rejections = this.counter('listener.rejected');
        const attempts = verifications + rejections;
        return {
            counters: Object.fromEntries(this.counters),
            avgWakeToVerifyMs: this.getAvgLatency('listener.wake_to_verify_ms'),
            avgRejectionLatencyMs: this.getAvgLatency('listener.rejection_latency_ms'),
            framesDropped: this.counter('listener.frames_dropped'),
            verifications,
            rejections,
            rejectionRate: attempts > 0 ? rejections / attempts : 0,
        };
    }
}

export const noopMetrics: MetricsSink = {
    record: () => undefined,
};
