import { z } from 'zod';

export const SYSTEM_DEPENDENCY_MANAGERS = ['npm', 'go', 'github-release'] as const;

export type SystemDependencyManager = (typeof SYSTEM_DEPENDENCY_MANAGERS)[number];

export const DEFAULT_RELEASE_INSTALL_DIR = '~/.local/bin';

const BinaryNameSchema = z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must be a bare executable name')
    .describe('Executable looked up on PATH');

export const NpmDependencySchema = z
    .object({
        manager: z.literal('npm'),
        package: z.string().min(1).describe('Argument passed to npm install -g'),
        binary: BinaryNameSchema,
    })
    .strict();

export const GoDependencySchema = z
    .object({
        manager: z.literal('go'),
        package: z.string().min(1).describe('Argument passed to go install, e.g. module/cmd@v1.2.3'),
        binary: BinaryNameSchema,
    })
    .strict();

export const ReleaseDependencySchema = z
    .object({
        manager: z.literal('github-release'),
        binary: BinaryNameSchema,
        repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'must be owner/name'),
        tag: z.string().min(1),
        asset: z
            .string()
            .min(1)
            .describe('Asset file name; {os} and {arch} are replaced for the current machine'),
        installDir: z.string().min(1).default(DEFAULT_RELEASE_INSTALL_DIR),
    })
    .strict();

export const SystemDependencySpecSchema = z.discriminatedUnion('manager', [
    NpmDependencySchema,
    GoDependencySchema,
    ReleaseDependencySchema,
]);

export type NpmDependencySpec = z.output<typeof NpmDependencySchema>;
export type GoDependencySpec = z.output<typeof GoDependencySchema>;
export type ReleaseDependencySpec = z.output<typeof ReleaseDependencySchema>;
export type ReleaseDependencySpecInput = z.input<typeof ReleaseDependencySchema>;
export type SystemDependencySpec = z.output<typeof SystemDependencySpecSchema>;

/** Spec shape accepted by each manager */
export interface SystemDependencySpecMap {
    npm: NpmDependencySpec;
    go: GoDependencySpec;
    'github-release': ReleaseDependencySpec;
}

/**
 * Manual install command shown in warnings and listings.
 */
export function describeDependencySource(spec: SystemDependencySpec): string {
    switch (spec.manager) {
        case 'npm':
        case 'go':
            return spec.package;
        case 'github-release':
            return `${spec.repo}@${spec.tag}`;
    }
}
