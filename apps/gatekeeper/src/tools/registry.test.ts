import { describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { registerBuiltinTools, slugify } from './builtin.js';
import { ToolRegistry } from './registry.js';

describe('ToolRegistry', () => {
    test('validates arguments before loading the tool and then caches it', async () => {
        const factory = vi.fn(() => ({
            invoke: async (args: { city: string }) => ({ ok: true, data: { city: args.city } }),
        }));
        const registry = new ToolRegistry().register({
            name: 'weather.lookup',
            description: 'Look up the weather',
            intents: ['chat'],
            inputSchema: z.object({ city: z.string().min(1) }),
            parameters: { city: 'city name' },
            requiresVerification: false,
            factory,
        });
        const dispatcher = registry.bindDispatcher();

        expect(dispatcher.prepare('weather.lookup', { city: '' })).toEqual({
            ok: false,
            issues: ['city: String must contain at least 1 character(s)'],
        });
        expect(dispatcher.prepare('weather.lookup', 'oslo')).toEqual({
            ok: false,
            issues: ['(root): Expected object, received string'],
        });
        expect(dispatcher.prepare('weather.radar', {})).toBeUndefined();
        expect(registry.isLoaded('weather.lookup')).toBe(false);
        expect(factory).not.toHaveBeenCalled();

        const call = dispatcher.prepare('weather.lookup', { city: 'Oslo' });
        if (!call?.ok) throw new Error('expected a valid call');
        await expect(call.run()).resolves.toEqual({ ok: true, data: { city: 'Oslo' } });
        await call.run();

        expect(factory).toHaveBeenCalledTimes(1);
        expect(registry.isLoaded('weather.lookup')).toBe(true);
    });

    test('hands out its dispatcher only once and otherwise exposes descriptors', () => {
        const registry = registerBuiltinTools(new ToolRegistry());
        const descriptor = registry.get('email.send');

        expect(descriptor && Object.keys(descriptor)).toEqual([
            'name',
            'description',
            'intents',
            'parameters',
            'requiresVerification',
            'requiresConfirmation',
        ]);
        expect(registry.isBound).toBe(false);
        registry.bindDispatcher();
        expect(registry.isBound).toBe(true);
        expect(() => registry.bindDispatcher()).toThrow('Tool registry is already bound to a gate');
    });

    test('rejects duplicate names', () => {
        const registry = registerBuiltinTools(new ToolRegistry());
        expect(() => registerBuiltinTools(registry)).toThrow('Tool "email.send" is already registered');
    });
});

describe('builtin tools', () => {
    test('registers dry-run email, call and blog tools that require verification', () => {
        const registry = registerBuiltinTools(new ToolRegistry());
        expect(registry.names()).toEqual(['email.send', 'email.draft', 'call.place', 'blog.publish']);
        expect(registry.describe().every((tool) => tool.requiresVerification)).toBe(true);
        expect(registry.describe().filter((tool) => tool.requiresConfirmation).map((tool) => tool.name)).toEqual([
            'email.send',
            'email.draft',
            'call.place',
        ]);
    });

    test('publishes to a slugged path under the configured directory', async () => {
        const dispatcher = registerBuiltinTools(new ToolRegistry(), { blogPublishDir: '/srv/blog' }).bindDispatcher();
        const call = dispatcher.prepare('blog.publish', { title: 'Hello, World!', body: 'First post.' });
        if (!call?.ok) throw new Error('expected a valid call');

        await expect(call.run()).resolves.toEqual({
            ok: true,
            data: { title: 'Hello, World!', url: '/srv/blog/hello-world.md' },
        });
    });

    test('validates phone numbers', () => {
        const dispatcher = registerBuiltinTools(new ToolRegistry()).bindDispatcher();
        expect(dispatcher.prepare('call.place', { to: 'mom' })).toEqual({
            ok: false,
            issues: ['to: expected a phone number'],
        });
        expect(dispatcher.prepare('call.place', { to: '+1 555 0100' })?.ok).toBe(true);
    });

    test('slugify keeps only lowercase words and dashes', () => {
        expect(slugify('  Ship It: v2.0 Notes! ')).toBe('ship-it-v2-0-notes');
    });
});
