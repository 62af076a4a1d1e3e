/**
 * Dry-run privileged tools. They never touch the network; each returns the
 * structured action it would have taken so a real adapter can be swapped in
 * behind the same schema.
 */

import { z } from 'zod';
import type { ToolRegistry } from './registry.js';

const EmailSchema = z.object({
    to: z.string().email(),
    subject: z.string().min(1).max(200),
    body: z.string().min(1),
});

const CallSchema = z.object({
    to: z.string().regex(/^\+?[0-9][0-9 ()-]{3,}$/, 'expected a phone number'),
    message: z.string().optional(),
});

const BlogSchema = z.object({
    title: z.string().min(1).max(120),
    body: z.string().min(1),
});

export function slugify(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export interface BuiltinToolOptions {
    blogPublishDir?: string;
}

export function registerBuiltinTools(registry: ToolRegistry, options: BuiltinToolOptions = {}): ToolRegistry {
    const publishDir = options.blogPublishDir ?? './blogs';

    return registry
        .register({
            name: 'email.send',
            description: 'Send an email from the owner account',
            intents: ['email'],
            inputSchema: EmailSchema,
            parameters: { to: 'recipient address', subject: 'subject line', body: 'plain-text body' },
            requiresVerification: true,
            requiresConfirmation: true,
            factory: () => ({
                invoke: async (args) => ({
                    ok: true,
                    data: { action: 'send', mode: 'dry-run', to: args.to, subject: args.subject },
                }),
            }),
        })
        .register({
            name: 'email.draft',
            description: 'Draft a reply without sending it',
            intents: ['email'],
            inputSchema: EmailSchema,
            parameters: { to: 'recipient address', subject: 'subject line', body: 'plain-text body' },
            requiresVerification: true,
            requiresConfirmation: true,
            factory: () => ({
                invoke: async (args) => ({
                    ok: true,
                    data: { action: 'draft', to: args.to, subject: args.subject, body: args.body },
                }),
            }),
        })
        .register({
            name: 'call.place',
            description: 'Place a phone call',
            intents: ['call'],
            inputSchema: CallSchema,
            parameters: { to: 'phone number', message: 'optional message to read out' },
            requiresVerification: true,
            requiresConfirmation: true,
            factory: () => ({
                invoke: async (args) => ({
                    ok: true,
                    data: { to: args.to, status: 'queued' },
                }),
            }),
        })
        .register({
            name: 'blog.publish',
            description: 'Publish a blog post',
            intents: ['blog'],
            inputSchema: BlogSchema,
            parameters: { title: 'post title', body: 'markdown body' },
            requiresVerification: true,
            factory: () => ({
                invoke: async (args) => ({
                    ok: true,
                    data: { title: args.title, url: `${publishDir}/${slugify(args.title)}.md` },
                }),
            }),
        });
}
