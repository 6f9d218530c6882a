/**
 * JSON stdio protocol spoken by process plugins.
 *
 *   <binary> --introspect        stdout: one descriptor object
 *   <binary> --execute '<json>'  stderr: {"progress", "message"} lines
 *                                stdout: one {"status", "summary", "data", "artifacts"} object
 */

import { z } from 'zod';
import type { CapabilityDescriptor, CapabilityKind, PluginDescriptor } from '../schemas.js';
import { RunStatusSchema } from '../schemas.js';

export const INTROSPECT_FLAG = '--introspect';
export const EXECUTE_FLAG = '--execute';

export const WIRE_PARAM_TYPES = ['str', 'int', 'float', 'bool', 'path'] as const;

export const WireParamSchema = z.object({
    name: z.string(),
    description: z.string().default(''),
    type: z.enum(WIRE_PARAM_TYPES),
    required: z.boolean().default(false),
    default: z.unknown().optional(),
    choices: z.array(z.string()).nullable().optional(),
});

export const WireDescriptorSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    version: z.string().min(1),
    requires_auth: z.boolean().default(false),
    params: z.array(WireParamSchema).default([]),
});

export const ProgressEventSchema = z.object({
    progress: z.number(),
    message: z.string().default(''),
});

export const WireResultSchema = z.object({
    status: RunStatusSchema,
    summary: z.string().default(''),
    data: z.record(z.unknown()).default({}),
    artifacts: z.record(z.string()).default({}),
});

export type WireParam = z.output<typeof WireParamSchema>;
export type WireDescriptor = z.output<typeof WireDescriptorSchema>;
export type ProgressEvent = z.output<typeof ProgressEventSchema>;
export type WireResult = z.output<typeof WireResultSchema>;

const WIRE_TO_KIND: Record<WireParam['type'], CapabilityKind> = {
    str: 'string',
    int: 'int',
    float: 'float',
    bool: 'bool',
    path: 'path',
};

const KIND_TO_WIRE: Record<CapabilityKind, WireParam['type']> = {
    string: 'str',
    int: 'int',
    float: 'float',
    bool: 'bool',
    path: 'path',
};

function wireDefault(value: unknown): CapabilityDescriptor['default'] {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    // null (and anything non-scalar) means "no default"
    return undefined;
}

export function wireParamToCapability(param: WireParam): CapabilityDescriptor {
    const capability: CapabilityDescriptor = {
        name: param.name,
        description: param.description,
        kind: WIRE_TO_KIND[param.type],
        required: param.required,
    };
    const defaultValue = wireDefault(param.default);
    if (defaultValue !== undefined) {
        capability.default = defaultValue;
    }
    if (param.choices) {
        capability.allowedValues = param.choices;
    }
    return capability;
}

export function wireToDescriptor(wire: WireDescriptor): PluginDescriptor {
    return {
        name: wire.name,
        description: wire.description,
        version: wire.version,
        requiresAuth: wire.requires_auth,
        capabilities: wire.params.map(wireParamToCapability),
    };
}

export function descriptorToWire(descriptor: PluginDescriptor): WireDescriptor {
    return {
        name: descriptor.name,
        description: descriptor.description,
        version: descriptor.version,
        requires_auth: descriptor.requiresAuth,
        params: descriptor.capabilities.map((capability) => ({
            name: capability.name,
            description: capability.description,
            type: KIND_TO_WIRE[capability.kind],
            required: capability.required,
            default: capability.default ?? null,
            choices: capability.allowedValues ?? null,
        })),
    };
}

/**
 * Parse one JSON value from text, tolerating surrounding whitespace.
 * Returns undefined when the text is not valid JSON.
 */
export function tryParseJson(text: string): unknown {
    const trimmed = text.trim();
    if (trimmed === '') {
        return undefined;
    }
    try {
        const value: unknown = JSON.parse(trimmed);
        return value;
    } catch {
        return undefined;
    }
}

/**
 * Parse a stderr line as a progress event; null for anything else.
 */
export function parseProgressLine(line: string): ProgressEvent | null {
    const parsed = ProgressEventSchema.safeParse(tryParseJson(line));
    return parsed.success ? parsed.data : null;
}

/**
 * The terminal result is the last non-empty stdout line that parses as a
 * result object, or the whole of stdout when it is one (pretty-printed) object.
 */
export function parseTerminalResult(stdout: string): WireResult | null {
    const whole = WireResultSchema.safeParse(tryParseJson(stdout));
    if (whole.success) {
        return whole.data;
    }
    const lines = stdout.split('\n').filter((line) => line.trim() !== '');
    for (let i = lines.length - 1; i >= 0; i--) {
        const line = lines[i];
        if (line === undefined) continue;
        const parsed = WireResultSchema.safeParse(tryParseJson(line));
        if (parsed.success) {
            return parsed.data;
        }
    }
    return null;
}
