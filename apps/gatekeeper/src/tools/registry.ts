/**
 * Tool registry with lazy loading.
 *
 * A registration describes a tool (name, intents, zod input schema) and how
 * to build it. Nothing is constructed at registration time; the first
 * authorized dispatch through ToolGate instantiates the tool and the
 * instance is reused afterwards.
 *
 * The public surface is descriptors only. Validation and instantiation are
 * reachable through a single dispatcher handed out once, to the gate.
 */

import type { z } from 'zod';
import type { IntentLabel, ToolResult } from '@voicegate/shared';
import type { ToolDescriptor } from '../nlp/router.js';

export interface ToolImplementation<TArgs> {
    invoke(args: TArgs): Promise<ToolResult>;
}

export interface ToolDefinition<TSchema extends z.ZodTypeAny> {
    name: string;
    description: string;
    intents: readonly IntentLabel[];
    inputSchema: TSchema;
    /** Human-readable parameter notes surfaced to the LLM. */
    parameters: Record<string, string>;
    requiresVerification: boolean;
    /** Ask the owner for an explicit yes before running. */
    requiresConfirmation?: boolean;
    factory: () => ToolImplementation<z.infer<TSchema>>;
}

export type PreparedCall =
    | { ok: true; run: () => Promise<ToolResult> }
    | { ok: false; issues: string[] };

export interface ToolDispatcher {
    /** Validate arguments; only a valid call can instantiate and run the tool. Undefined for unknown tools. */
    prepare(name: string, args: unknown): PreparedCall | undefined;
}

interface RegistryEntry {
    descriptor: Readonly<ToolDescriptor>;
    prepare(args: unknown): PreparedCall;
    isLoaded(): boolean;
}

export class ToolRegistry {
    readonly #entries = new Map<string, RegistryEntry>();
    #bound = false;

    register<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): this {
        if (this.#entries.has(definition.name)) {
            throw new Error(`Tool "${definition.name}" is already registered`);
        }

        let instance: ToolImplementation<z.infer<TSchema>> | null = null;
        const load = (): ToolImplementation<z.infer<TSchema>> => (instance ??= definition.factory());

        this.#entries.set(definition.name, {
            descriptor: Object.freeze({
                name: definition.name,
                description: definition.description,
                intents: Object.freeze([...definition.intents]),
                parameters: Object.freeze({ ...definition.parameters }),
                requiresVerification: definition.requiresVerification,
                requiresConfirmation: definition.requiresConfirmation ?? false,
            }),
            prepare: (args) => {
                const parsed = definition.inputSchema.safeParse(args);
                if (!parsed.success) {
                    return {
                        ok: false,
                        issues: parsed.error.issues.map(
                            (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
                        ),
                    };
                }
                const validated: z.infer<TSchema> = parsed.data;
                return { ok: true, run: () => load().invoke(validated) };
            },
            isLoaded: () => instance !== null,
        });
        return this;
    }

    /**
     * Hands out the only path to tool implementations. Callable once; the
     * gate that owns the registry takes it at construction.
     */
    bindDispatcher(): ToolDispatcher {
        if (this.#bound) {
            throw new Error('Tool registry is already bound to a gate');
        }
        this.#bound = true;
        return { prepare: (name, args) => this.#entries.get(name)?.prepare(args) };
    }

    get isBound(): boolean {
        return this.#bound;
    }

    get(name: string): Readonly<ToolDescriptor> | undefined {
        return this.#entries.get(name)?.descriptor;
    }

    isLoaded(name: string): boolean {
        return this.#entries.get(name)?.isLoaded() ?? false;
    }

    names(): string[] {
        return [...this.#entries.keys()];
    }

    describe(): Readonly<ToolDescriptor>[] {
        return [...this.#entries.values()].map((entry) => entry.descriptor);
    }
}
