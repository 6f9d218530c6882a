/**
 * Wire-reusable schemas for plugin descriptors and run outcomes.
 *
 * These carry no CLI or transport types so that any front end (CLI, a
 * remote service) can validate and publish them as-is.
 */

import { z } from 'zod';

export const CAPABILITY_KINDS = ['string', 'int', 'float', 'bool', 'path'] as const;

export const CapabilityKindSchema = z.enum(CAPABILITY_KINDS);

export const CapabilityValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const CapabilityDescriptorSchema = z
    .object({
        name: z.string().describe('Argument name, unique within the plugin'),
        description: z.string().default(''),
        kind: CapabilityKindSchema,
        required: z.boolean().default(false),
        default: CapabilityValueSchema.optional(),
        allowedValues: z.array(z.string()).optional(),
    })
    .strict();

export const PluginDescriptorSchema = z
    .object({
        name: z.string().min(1),
        description: z.string().default(''),
        version: z.string().min(1),
        requiresAuth: z.boolean().default(false),
        capabilities: z.array(CapabilityDescriptorSchema).default([]),
    })
    .strict();

export const RUN_STATUSES = ['success', 'failure', 'partial', 'cancelled'] as const;

export const RunStatusSchema = z.enum(RUN_STATUSES);

export const RunOutcomeSchema = z
    .object({
        status: RunStatusSchema,
        summary: z.string().default(''),
        data: z.record(z.unknown()).default({}),
        artifacts: z.record(z.string()).default({}),
    })
    .strict();

export type CapabilityKind = z.output<typeof CapabilityKindSchema>;
export type CapabilityValue = z.output<typeof CapabilityValueSchema>;
export type CapabilityDescriptor = z.output<typeof CapabilityDescriptorSchema>;
export type CapabilityDescriptorInput = z.input<typeof CapabilityDescriptorSchema>;
export type PluginDescriptor = z.output<typeof PluginDescriptorSchema>;
export type RunStatus = z.output<typeof RunStatusSchema>;
export type RunOutcomeInput = z.input<typeof RunOutcomeSchema>;
