/**
 * Listener State Machine (XState v5)
 *
 * idle -> listening_for_wake -> wake_detected -> guardrail_check -> verifying
 *      -> verified_active -> idle
 *                         \-> cooldown -> idle
 *
 * The machine owns guardrail accounting and rejection/cooldown bookkeeping.
 * Collaborator calls (wake detection, extraction, verification) happen in
 * ContinuousListener, which reports their outcome as events.
 */

import { assign, setup } from 'xstate';
import { ListenerState, type GuardrailState, type RejectionReason } from '@voicegate/shared';
import type { CooldownConfig } from '../config.js';
import { emptyGuardrailState, type AudioGuardrail, type FrameMeasurement } from './guardrail.js';

export type ListenerEvent =
    | { type: 'FRAME'; measurement: FrameMeasurement; at: number }
    | { type: 'WAKE'; confidence: number; at: number }
    | { type: 'VERIFIED'; at: number }
    | { type: 'REJECTED'; reason: RejectionReason; countsTowardLockout: boolean; at: number }
    | { type: 'RELEASE' }
    | { type: 'RESET' };

export interface ListenerMachineInput {
    rules: AudioGuardrail;
    wakeThreshold: number;
    cooldown: CooldownConfig;
}

export interface ListenerContext extends ListenerMachineInput {
    guardrail: GuardrailState;
    rejectedSegment: GuardrailState | null;
    wakeAt: number | null;
    consecutiveRejections: number;
    windowStartedAt: number | null;
    cooldownUntil: number;
    lastCooldownMs: number;
}

/**
 * Base cooldown until `maxConsecutiveRejections` is reached, then
 * base * factor^(count - max + 1), capped.
 */
export function cooldownFor(consecutiveRejections: number, cooldown: CooldownConfig): number {
    if (consecutiveRejections < cooldown.maxConsecutiveRejections) return cooldown.baseMs;
    const exponent = consecutiveRejections - cooldown.maxConsecutiveRejections + 1;
    return Math.min(cooldown.maxMs, cooldown.baseMs * Math.pow(cooldown.escalationFactor, exponent));
}

const LISTENER_STATES: readonly ListenerState[] = Object.values(ListenerState);

export function toListenerState(value: unknown): ListenerState {
    const state = LISTENER_STATES.find((candidate) => candidate === value);
    if (!state) {
        throw new Error(`Unexpected listener state value: ${JSON.stringify(value)}`);
    }
    return state;
}

export const listenerMachine = setup({
    types: {
        context: {} as ListenerContext,
        events: {} as ListenerEvent,
        input: {} as ListenerMachineInput,
    },
    guards: {
        wakeAccepted: ({ context, event }) => event.type === 'WAKE' && event.confidence >= context.wakeThreshold,
        minSpeechReached: ({ context }) => context.rules.evaluate(context.guardrail) === 'passed',
        silenceExceeded: ({ context }) => context.rules.evaluate(context.guardrail) === 'rejected',
        cooldownElapsed: ({ context, event }) => event.type === 'FRAME' && event.at >= context.cooldownUntil,
    },
    actions: {
        markWake: assign(({ event }) => ({
            wakeAt: event.type === 'WAKE' ? event.at : null,
            guardrail: emptyGuardrailState(),
            rejectedSegment: null,
        })),
        accumulateFrame: assign(({ context, event }) => {
            if (event.type !== 'FRAME') return {};
            return { guardrail: context.rules.accumulate(context.guardrail, event.measurement) };
        }),
        discardSegment: assign(({ context }) => ({
            rejectedSegment: context.guardrail,
            guardrail: emptyGuardrailState(),
            wakeAt: null,
        })),
        recordSuccess: assign(() => ({
            guardrail: emptyGuardrailState(),
            consecutiveRejections: 0,
            windowStartedAt: null,
            lastCooldownMs: 0,
        })),
        recordRejection: assign(({ context, event }) => {
            if (event.type !== 'REJECTED') return {};

            let count = context.consecutiveRejections;
            let windowStartedAt = context.windowStartedAt;
            if (event.countsTowardLockout) {
                const windowExpired =
                    windowStartedAt === null || event.at - windowStartedAt > context.cooldown.rejectionWindowMs;
                if (windowExpired) {
                    count = 1;
                    windowStartedAt = event.at;
                } else {
                    count += 1;
                }
            }

            const cooldownMs = event.countsTowardLockout ? cooldownFor(count, context.cooldown) : context.cooldown.baseMs;
            return {
                guardrail: emptyGuardrailState(),
                consecutiveRejections: count,
                windowStartedAt,
                lastCooldownMs: cooldownMs,
                cooldownUntil: event.at + cooldownMs,
            };
        }),
        clearWake: assign(() => ({ wakeAt: null })),
        resetSession: assign(() => ({
            guardrail: emptyGuardrailState(),
            rejectedSegment: null,
            wakeAt: null,
        })),
    },
}).createMachine({
    id: 'listener',
    initial: 'idle',
    context: ({ input }) => ({
        ...input,
        guardrail: emptyGuardrailState(),
        rejectedSegment: null,
        wakeAt: null,
        consecutiveRejections: 0,
        windowStartedAt: null,
        cooldownUntil: 0,
        lastCooldownMs: 0,
    }),
    on: {
        RESET: { target: '.idle', actions: 'resetSession' },
    },
    states: {
        idle: {
            on: {
                FRAME: 'listening_for_wake',
                WAKE: { guard: 'wakeAccepted', target: 'wake_detected', actions: 'markWake' },
            },
        },
        listening_for_wake: {
            on: {
                WAKE: { guard: 'wakeAccepted', target: 'wake_detected', actions: 'markWake' },
            },
        },
        wake_detected: {
            on: {
                FRAME: { target: 'guardrail_check', actions: 'accumulateFrame' },
            },
        },
        guardrail_check: {
            always: [
                { guard: 'minSpeechReached', target: 'verifying' },
                { guard: 'silenceExceeded', target: 'idle', actions: 'discardSegment' },
            ],
            on: {
                FRAME: { actions: 'accumulateFrame' },
            },
        },
        verifying: {
            on: {
                VERIFIED: { target: 'verified_active', actions: 'recordSuccess' },
                REJECTED: { target: 'cooldown', actions: 'recordRejection' },
            },
        },
        verified_active: {
            on: {
                RELEASE: { target: 'idle', actions: 'clearWake' },
            },
        },
        cooldown: {
            on: {
                FRAME: { guard: 'cooldownElapsed', target: 'idle', actions: 'clearWake' },
            },
        },
    },
});
