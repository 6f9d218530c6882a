import { describe, it, expect } from 'vitest';
import {
    WireDescriptorSchema,
    descriptorToWire,
    parseProgressLine,
    parseTerminalResult,
    wireToDescriptor,
} from './protocol.js';

describe('wireToDescriptor', () => {
    it('should map wire params onto capability descriptors', () => {
        const wire = WireDescriptorSchema.parse({
            name: 'scan',
            description: 'Scan images',
            version: '1.2.0',
            requires_auth: true,
            params: [
                { name: 'image', description: 'Image ref', type: 'str', required: true, default: null, choices: null },
                { name: 'depth', description: '', type: 'int', required: false, default: 2, choices: null },
                { name: 'mode', description: '', type: 'str', required: false, default: 'fast', choices: ['fast', 'full'] },
            ],
        });

        expect(wireToDescriptor(wire)).toEqual({
            name: 'scan',
            description: 'Scan images',
            version: '1.2.0',
            requiresAuth: true,
            capabilities: [
                { name: 'image', description: 'Image ref', kind: 'string', required: true },
                { name: 'depth', description: '', kind: 'int', required: false, default: 2 },
                {
                    name: 'mode',
                    description: '',
                    kind: 'string',
                    required: false,
                    default: 'fast',
                    allowedValues: ['fast', 'full'],
                },
            ],
        });
    });

    it('should reproduce the descriptor after a trip through the wire form', () => {
        const descriptor = wireToDescriptor(
            WireDescriptorSchema.parse({
                name: 'survey',
                description: 'd',
                version: '1.0.0',
                requires_auth: false,
                params: [{ name: 'flag', type: 'bool', required: false, default: true }],
            })
        );

        expect(wireToDescriptor(WireDescriptorSchema.parse(descriptorToWire(descriptor)))).toEqual(
            descriptor
        );
    });
});

describe('parseProgressLine', () => {
    it('should parse progress events', () => {
        expect(parseProgressLine('{"progress":0.5,"message":"half"}')).toEqual({
            progress: 0.5,
            message: 'half',
        });
    });

    it('should return null for plain log lines', () => {
        expect(parseProgressLine('warning: something')).toBeNull();
        expect(parseProgressLine('{"level":"info"}')).toBeNull();
    });
});

describe('parseTerminalResult', () => {
    it('should accept a pretty-printed result object', () => {
        const stdout = JSON.stringify({ status: 'success', summary: 'ok', data: {}, artifacts: {} }, null, 2);

        expect(parseTerminalResult(stdout)).toEqual({
            status: 'success',
            summary: 'ok',
            data: {},
            artifacts: {},
        });
    });

    it('should take the last result line when stdout has preceding noise', () => {
        const stdout = 'starting\n{"status":"partial","summary":"2 of 3"}\n';

        expect(parseTerminalResult(stdout)).toEqual({
            status: 'partial',
            summary: '2 of 3',
            data: {},
            artifacts: {},
        });
    });

    it('should return null when there is no result object', () => {
        expect(parseTerminalResult('')).toBeNull();
        expect(parseTerminalResult('not json at all')).toBeNull();
        expect(parseTerminalResult('{"status":"exploded"}')).toBeNull();
    });
});
