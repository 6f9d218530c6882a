const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
    darwin: 'darwin',
    linux: 'linux',
    win32: 'windows',
};

const ARCH_NAMES: Record<string, string> = {
    x64: 'amd64',
    x86_64: 'amd64',
    arm64: 'arm64',
    aarch64: 'arm64',
};

export function releaseOsName(platform: NodeJS.Platform): string {
    return OS_NAMES[platform] ?? platform;
}

export function releaseArchName(arch: string): string {
    return ARCH_NAMES[arch] ?? arch;
}

/**
 * Expand `{os}` and `{arch}` in a release asset template,
 * e.g. `scanner_{os}_{arch}` → `scanner_linux_amd64`.
 */
export function resolveAssetName(
    template: string,
    platform: NodeJS.Platform = process.platform,
    arch: string = process.arch
): string {
    return template
        .replace(/\{os\}/g, releaseOsName(platform))
        .replace(/\{arch\}/g, releaseArchName(arch));
}
