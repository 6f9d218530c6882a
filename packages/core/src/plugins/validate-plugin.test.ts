import { describe, it, expect } from 'vitest';
import { isToolPlugin, validateToolPlugin } from './validate-plugin.js';
import { PluginErrorCode } from './error-codes.js';
import { createRunOutcome } from './outcome.js';
import type { ToolPlugin } from './types.js';

function makePlugin(overrides: Partial<Record<keyof ToolPlugin, unknown>> = {}): unknown {
    return {
        name: 'survey',
        description: 'Survey things',
        version: '1.0.0',
        requiresAuth: false,
        getCapabilities: () => [{ name: 'target', kind: 'string', required: true }],
        run: async () => createRunOutcome('success', 'ok'),
        ...overrides,
    };
}

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('isToolPlugin', () => {
    it('should accept an object satisfying the contract', () => {
        expect(isToolPlugin(makePlugin())).toBe(true);
    });

    it('should accept class instances with prototype methods', () => {
        class Survey {
            readonly name = 'survey';
            readonly description = '';
            readonly version = '0.1.0';
            readonly requiresAuth = true;
            getCapabilities() {
                return [];
            }
            async run() {
                return createRunOutcome('success', 'ok');
            }
        }

        expect(isToolPlugin(new Survey())).toBe(true);
    });

    it('should reject objects missing run', () => {
        expect(isToolPlugin(makePlugin({ run: undefined }))).toBe(false);
        expect(isToolPlugin(null)).toBe(false);
    });
});

describe('validateToolPlugin', () => {
    it('should return a normalized descriptor', () => {
        const { descriptor } = validateToolPlugin(makePlugin(), 'test');

        expect(descriptor).toEqual({
            name: 'survey',
            description: 'Survey things',
            version: '1.0.0',
            requiresAuth: false,
            capabilities: [{ name: 'target', description: '', kind: 'string', required: true }],
        });
    });

    it('should report shape problems', () => {
        expect(captureError(() => validateToolPlugin(makePlugin({ version: 3 }), 'pkg:entry'))).toMatchObject({
            code: PluginErrorCode.LOAD_INVALID_SHAPE,
            context: { origin: 'pkg:entry', problems: ['version: Expected string, received number'] },
        });
    });

    it('should reject capability lists that break invariants', () => {
        const candidate = makePlugin({
            getCapabilities: () => [{ name: 'x', kind: 'string', required: true, default: 'y' }],
        });

        expect(() => validateToolPlugin(candidate, 'test')).toThrowError(
            "Plugin 'survey' declares invalid capabilities: 'x' is required but declares a default"
        );
    });

    it('should reject unknown capability kinds', () => {
        const candidate = makePlugin({
            getCapabilities: () => [{ name: 'x', kind: 'list', required: false }],
        });

        expect(captureError(() => validateToolPlugin(candidate, 'test'))).toMatchObject({
            code: PluginErrorCode.LOAD_INVALID_CAPABILITIES,
        });
    });

    it('should convert a throwing getCapabilities into a shape error', () => {
        const candidate = makePlugin({
            getCapabilities: () => {
                throw new Error('boom');
            },
        });

        expect(() => validateToolPlugin(candidate, 'test')).toThrowError(
            'getCapabilities threw: boom'
        );
    });
});
