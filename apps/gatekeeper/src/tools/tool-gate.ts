import type { RoutingDecision, ToolResult, VerificationToken } from '@voicegate/shared';
import {
    ClarificationRequiredError,
    ConfirmationDeclinedError,
    InvalidArgsError,
    ToolNotRoutedError,
    UnknownToolError,
    UnverifiedError,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MetricsSink } from '../lib/metrics.js';
import { withTimeout } from '../lib/timeout.js';
import type { ToolDescriptor } from '../nlp/router.js';
import { confirmationQuestion, isAffirmative, type ConfirmationPrompt } from './confirmation.js';
import type { ToolDispatcher, ToolRegistry } from './registry.js';
import type { TokenLedger } from './token-ledger.js';

export interface ToolInvocation {
    tool: string;
    args: unknown;
}

export interface ToolGateOptions {
    ownerId: string;
    toolTimeoutMs: number;
    /** Asked before any tool that requires confirmation; without it such tools are refused. */
    confirm?: ConfirmationPrompt;
    confirmationTimeoutMs?: number;
}

const DEFAULT_CONFIRMATION_TIMEOUT_MS = 15_000;

/**
 * The single enforcement point between a routing decision and a tool
 * implementation. Every dispatch attempt burns the presented token, so a
 * token can never authorize a second call. The gate takes the registry's
 * dispatcher when it is built; nothing else can reach an implementation.
 */
export class ToolGate {
    private readonly logger: Logger;
    private readonly dispatcher: ToolDispatcher;

    constructor(
        private readonly registry: ToolRegistry,
        private readonly tokens: TokenLedger,
        private readonly options: ToolGateOptions,
        private readonly metrics: MetricsSink,
        logger: Logger
    ) {
        this.logger = logger.child({ component: 'tool-gate' });
        this.dispatcher = registry.bindDispatcher();
    }

    async authorizeAndDispatch(
        decision: RoutingDecision,
        token: VerificationToken | null | undefined,
        invocation: ToolInvocation
    ): Promise<ToolResult> {
        const check = this.tokens.consume(token, this.options.ownerId);
        const tool = this.registry.get(invocation.tool);

        try {
            if (!check.valid && (!tool || tool.requiresVerification)) {
                throw new UnverifiedError(`token ${check.reason.replace('_', ' ')}`);
            }
            if (!tool) {
                throw new UnknownToolError(invocation.tool);
            }
            if (decision.clarificationNeeded) {
                throw new ClarificationRequiredError(decision.intentLabel, decision.confidence);
            }
            if (!decision.toolSchemaRefs.includes(invocation.tool)) {
                throw new ToolNotRoutedError(invocation.tool, decision.intentLabel);
            }

            const call = this.dispatcher.prepare(invocation.tool, invocation.args);
            if (!call) {
                throw new UnknownToolError(invocation.tool);
            }
            if (!call.ok) {
                throw new InvalidArgsError(invocation.tool, call.issues);
            }
            if (tool.requiresConfirmation) {
                await this.confirm(tool);
            }

            this.metrics.record('tool_gate.dispatched', 1, { tool: invocation.tool });
            this.logger.info({ tool: invocation.tool, intent: decision.intentLabel }, 'Dispatching tool');
            return await this.run(invocation.tool, call.run);
        } catch (error) {
            const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN';
            this.metrics.record('tool_gate.denied', 1, { tool: invocation.tool, code });
            this.logger.warn({ tool: invocation.tool, code }, 'Tool dispatch denied');
            throw error;
        }
    }

    private async confirm(tool: Readonly<ToolDescriptor>): Promise<void> {
        const prompt = this.options.confirm;
        if (!prompt) {
            throw new ConfirmationDeclinedError(tool.name, 'no confirmation prompt is configured');
        }

        const question = confirmationQuestion(tool.name);
        const timeoutMs = this.options.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS;
        const answer = await withTimeout(`confirmation for ${tool.name}`, timeoutMs, () => prompt(question, tool));
        if (!isAffirmative(answer)) {
            throw new ConfirmationDeclinedError(tool.name, `answered "${answer.trim()}"`);
        }
        this.metrics.record('tool_gate.confirmed', 1, { tool: tool.name });
    }

    // Implementation failures are reported as a failed result, not as a gate denial.
    private async run(name: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
        try {
            return await withTimeout(`tool ${name}`, this.options.toolTimeoutMs, run);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.metrics.record('tool_gate.failed', 1, { tool: name });
            this.logger.error({ tool: name, error }, 'Tool invocation failed');
            return { ok: false, error: message };
        }
    }
}
