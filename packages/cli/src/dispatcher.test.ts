import { describe, it, expect, vi } from 'vitest';
import {
    PluginErrorCode,
    PluginRegistry,
    createRunOutcome,
    isUsageError,
    type AuthTokenProvider,
    type CapabilityDescriptor,
    type ExecutionContext,
    type ToolPlugin,
} from '@fieldkit/core';
import { createMockLogger } from '@fieldkit/core/test-utils';
import { createPlugin as createHelloPlugin } from '@fieldkit/plugin-hello';
import { Dispatcher } from './dispatcher.js';
import { EXIT_CODES, exitCodeForError } from './exit.js';

function stubPlugin(
    name: string,
    run: ToolPlugin['run'],
    options: { requiresAuth?: boolean; capabilities?: CapabilityDescriptor[] } = {}
): ToolPlugin {
    return {
        name,
        description: `${name} plugin`,
        version: '1.0.0',
        requiresAuth: options.requiresAuth ?? false,
        getCapabilities: () => options.capabilities ?? [],
        run,
    };
}

function setup(plugins: ToolPlugin[], tokenProvider?: AuthTokenProvider) {
    const logger = createMockLogger();
    const registry = new PluginRegistry(logger);
    for (const plugin of plugins) {
        registry.registerCandidate(plugin, 'native', `test:${plugin.name}`);
    }
    const getToken = vi.fn(async () => 'test-secret');
    const dispatcher = new Dispatcher(registry, {
        logger,
        tokenProvider: tokenProvider ?? { getToken },
        toolConfig: { hello: { delayMs: 0 }, configured: { region: 'eu' } },
    });
    return { dispatcher, registry, logger, getToken };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('expected the promise to reject');
}

describe('Dispatcher', () => {
    it('should run the hello plugin and exit 0', async () => {
        const { dispatcher } = setup([createHelloPlugin()]);
        const progress = vi.fn();

        const { outcome, exitCode } = await dispatcher.invoke(
            'hello',
            { name: 'World', count: '2' },
            { progress }
        );

        expect(exitCode).toBe(0);
        expect(outcome.status).toBe('success');
        expect(outcome.data['output']).toBe('Hello, World!\nHello, World!');
        expect(progress.mock.calls).toEqual([
            [0, 'Starting greetings'],
            [0.5, 'Progress: 1/2'],
            [1, 'Progress: 2/2'],
            [1, 'Done'],
        ]);
    });

    it('should reject a missing required argument without running the plugin', async () => {
        const run = vi.fn<ToolPlugin['run']>(async () => createRunOutcome('success', 'ran'));
        const { dispatcher } = setup([
            stubPlugin('greet', run, {
                capabilities: [
                    { name: 'name', description: 'Name', kind: 'string', required: true },
                ],
            }),
        ]);

        const error = await captureError(dispatcher.invoke('greet', {}));

        expect(isUsageError(error)).toBe(true);
        expect(error).toMatchObject({ code: PluginErrorCode.MISSING_ARGUMENT });
        expect(exitCodeForError(error)).toBe(EXIT_CODES.usage);
        expect(run).not.toHaveBeenCalled();
    });

    it('should treat capabilities named like prototype members as absent when omitted', async () => {
        const run = vi.fn<ToolPlugin['run']>(async () => createRunOutcome('success', 'ran'));
        const { dispatcher } = setup([
            stubPlugin('shadow', run, {
                capabilities: [
                    { name: 'constructor', description: 'Target', kind: 'string', required: true },
                    { name: 'valueOf', description: 'Limit', kind: 'int', required: false },
                ],
            }),
        ]);

        const error = await captureError(dispatcher.invoke('shadow', {}));

        expect(error).toMatchObject({
            code: PluginErrorCode.MISSING_ARGUMENT,
            message: "Missing required argument 'constructor'",
        });
        expect(run).not.toHaveBeenCalled();
    });

    it('should reject an unknown plugin name as a usage error', async () => {
        const { dispatcher } = setup([createHelloPlugin()]);

        const error = await captureError(dispatcher.invoke('nope', {}));

        expect(error).toMatchObject({
            code: PluginErrorCode.NOT_FOUND,
            message: "Unknown plugin 'nope'",
            recovery: 'Available plugins: hello',
        });
        expect(exitCodeForError(error)).toBe(64);
    });

    it('should convert a thrown error into a failure outcome', async () => {
        const { dispatcher, logger } = setup([
            stubPlugin('boom', async () => {
                throw new Error('kaboom');
            }),
        ]);

        const { outcome, exitCode } = await dispatcher.invoke('boom', {});

        expect(exitCode).toBe(1);
        expect(outcome.status).toBe('failure');
        expect(outcome.summary).toBe("Plugin 'boom' failed: kaboom");
        expect(outcome.data['error']).toEqual({
            code: PluginErrorCode.EXECUTION_FAILED,
            message: 'kaboom',
        });
        expect(logger.trackException).toHaveBeenCalledWith(expect.any(Error), { plugin: 'boom' });
    });

    it('should convert a malformed return value into a failure outcome', async () => {
        const { dispatcher, registry } = setup([]);
        registry.registerCandidate(
            {
                name: 'odd',
                description: 'odd plugin',
                version: '1.0.0',
                requiresAuth: false,
                getCapabilities: () => [],
                run: async () => ({ status: 'done' }),
            },
            'native',
            'test:odd'
        );

        const { outcome, exitCode } = await dispatcher.invoke('odd', {});

        expect(exitCode).toBe(1);
        expect(outcome.summary).toMatch(/^Plugin 'odd' returned an invalid result: /);
        expect(outcome.data['error']).toEqual({ code: PluginErrorCode.INVALID_OUTCOME });
    });

    it('should map partial and cancelled outcomes to 2 and 130', async () => {
        const { dispatcher } = setup([
            stubPlugin('half', async () => createRunOutcome('partial', 'some checks failed')),
            createHelloPlugin(),
        ]);
        const controller = new AbortController();
        controller.abort();

        const partial = await dispatcher.invoke('half', {});
        const cancelled = await dispatcher.invoke(
            'hello',
            { name: 'World' },
            { signal: controller.signal }
        );

        expect(partial.exitCode).toBe(2);
        expect(cancelled.exitCode).toBe(130);
        expect(cancelled.outcome.summary).toBe('Cancelled by user');
    });

    it('should resolve a token only for plugins that require auth', async () => {
        const seen: string[] = [];
        const record: ToolPlugin['run'] = async (_args, ctx: ExecutionContext) => {
            seen.push(ctx.authToken);
            return createRunOutcome('success', 'ok');
        };
        const { dispatcher, getToken } = setup([
            stubPlugin('open', record),
            stubPlugin('secure', record, { requiresAuth: true }),
        ]);

        await dispatcher.invoke('open', {});
        expect(getToken).not.toHaveBeenCalled();

        await dispatcher.invoke('secure', {});
        expect(getToken).toHaveBeenCalledTimes(1);
        expect(seen).toEqual(['', 'test-secret']);
    });

    it('should fail without running the plugin when the token cannot be resolved', async () => {
        const run = vi.fn<ToolPlugin['run']>(async () => createRunOutcome('success', 'ran'));
        const { dispatcher } = setup([stubPlugin('secure', run, { requiresAuth: true })], {
            getToken: async () => {
                throw new Error('token expired');
            },
        });

        const { outcome, exitCode } = await dispatcher.invoke('secure', {});

        expect(exitCode).toBe(1);
        expect(outcome.summary).toBe('Authentication failed: token expired');
        expect(run).not.toHaveBeenCalled();
    });

    it('should pass the tools config section of the plugin to its context', async () => {
        let config: unknown;
        const { dispatcher } = setup([
            stubPlugin('configured', async (_args, ctx) => {
                config = ctx.config;
                return createRunOutcome('success', 'ok');
            }),
        ]);

        await dispatcher.invoke('configured', {});

        expect(config).toEqual({ region: 'eu' });
    });
});
