import { z } from 'zod';

export const PLUGIN_TYPES = ['native', 'wrapper', 'binary'] as const;

/**
 * Where a binary plugin's executable comes from. Only GitHub releases today.
 */
export const BinarySourceSchema = z
    .object({
        manager: z.literal('github-release').default('github-release'),
        binary: z.string().min(1).optional().describe('Defaults to the plugin name'),
        repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'must be owner/name'),
        tag: z.string().min(1),
        asset: z.string().min(1),
        installDir: z
            .string()
            .min(1)
            .optional()
            .describe('Defaults to the bin directory under the plugin home'),
    })
    .strict();

export const CatalogEntrySchema = z
    .object({
        description: z.string().default(''),
        pluginType: z.enum(PLUGIN_TYPES).default('native'),
        package: z
            .string()
            .min(1)
            .optional()
            .describe('npm package name of a native or wrapper plugin'),
        source: z
            .string()
            .min(1)
            .optional()
            .describe('npm install argument; defaults to the package name'),
        ref: z.string().min(1).optional().describe('Version, tag or git ref installed by default'),
        tags: z.array(z.string()).default([]),
        private: z.boolean().default(false),
        // Parsed per entry by parseSystemDependencies at install time
        systemDeps: z.array(z.unknown()).default([]),
        binarySource: BinarySourceSchema.optional(),
    })
    .strict()
    .superRefine((entry, ctx) => {
        if (entry.pluginType === 'binary' && !entry.binarySource) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['binarySource'],
                message: 'binary plugins need a binarySource',
            });
        }
        if (entry.pluginType !== 'binary' && !entry.package) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['package'],
                message: `${entry.pluginType} plugins need a package`,
            });
        }
    });

export const PluginCatalogFileSchema = z
    .object({
        plugins: z.record(CatalogEntrySchema).default({}),
    })
    .strict();

export type PluginType = (typeof PLUGIN_TYPES)[number];
export type BinarySource = z.output<typeof BinarySourceSchema>;
export type CatalogEntry = z.output<typeof CatalogEntrySchema>;
export type CatalogEntryInput = z.input<typeof CatalogEntrySchema>;
export type PluginCatalogFile = z.output<typeof PluginCatalogFileSchema>;
