/**
 * Externally described tools (for example, tools exposed by sidecar
 * containers). Definitions arrive as a JSON list, inline in the environment
 * or in a mounted file, and are registered like any other tool: behind the
 * gate, verified and confirmed by default.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ToolResult } from '@voicegate/shared';
import type { DiscoveryConfig } from '../config.js';
import { ConfigInvalidError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ToolRegistry } from './registry.js';

const IntentLabelSchema = z.enum(['chat', 'email', 'call', 'blog', 'tool-needed', 'unknown']);

const DiscoveredToolSchema = z.object({
    name: z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/i, 'expected a tool name like "backup.run"'),
    description: z.string().default(''),
    intents: z.array(IntentLabelSchema).min(1).default(['tool-needed']),
    parameters: z.record(z.string()).default({}),
    requiresVerification: z.boolean().default(true),
    requiresConfirmation: z.boolean().default(true),
});

const DiscoveredToolListSchema = z.array(DiscoveredToolSchema);

export type DiscoveredTool = z.infer<typeof DiscoveredToolSchema>;

export type DiscoveredToolInvoker = (tool: DiscoveredTool, args: Record<string, unknown>) => Promise<ToolResult>;

export const dryRunInvoker: DiscoveredToolInvoker = async (tool, args) => ({
    ok: true,
    data: { tool: tool.name, mode: 'dry-run', args },
});

export function parseDiscoveredTools(raw: string, source: string): DiscoveredTool[] {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigInvalidError([`${source}: not valid JSON (${reason})`]);
    }

    const parsed = DiscoveredToolListSchema.safeParse(json);
    if (!parsed.success) {
        throw new ConfigInvalidError(
            parsed.error.issues.map((issue) => `${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export async function loadDiscoveredTools(config: DiscoveryConfig, logger?: Logger): Promise<DiscoveredTool[]> {
    if (config.inline) {
        const tools = parseDiscoveredTools(config.inline, 'VOICEGATE_DISCOVERED_TOOLS');
        logger?.info({ count: tools.length, source: 'env' }, 'Discovered tools loaded');
        return tools;
    }
    if (!config.path) return [];

    let raw: string;
    try {
        raw = await readFile(config.path, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigInvalidError([`${config.path}: cannot be read (${reason})`]);
    }
    const tools = parseDiscoveredTools(raw, config.path);
    logger?.info({ count: tools.length, source: config.path }, 'Discovered tools loaded');
    return tools;
}

export function registerDiscoveredTools(
    registry: ToolRegistry,
    tools: readonly DiscoveredTool[],
    invoke: DiscoveredToolInvoker = dryRunInvoker
): ToolRegistry {
    for (const tool of tools) {
        registry.register({
            name: tool.name,
            description: tool.description,
            intents: tool.intents,
            inputSchema: z.record(z.unknown()),
            parameters: tool.parameters,
            requiresVerification: tool.requiresVerification,
            requiresConfirmation: tool.requiresConfirmation,
            factory: () => ({ invoke: (args) => invoke(tool, args) }),
        });
    }
    return registry;
}
