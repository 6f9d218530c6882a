import * as path from 'path';
import { promises as fs, existsSync } from 'fs';
import { z } from 'zod';
import { expandHome, toErrorMessage } from '@fieldkit/core';
import { InstallerErrorCode } from '../error-codes.js';
import { resolveAssetName } from './platform.js';
import { failedResult, installedResult } from './results.js';
import type { ReleaseDependencySpec } from './schemas.js';
import type { DependencyInstallResult, InstallerEnvironment, SystemDependencyInstaller } from './types.js';

const GITHUB_API_URL = 'https://api.github.com';

const GitHubReleaseSchema = z.object({
    assets: z
        .array(
            z.object({
                name: z.string(),
                browser_download_url: z.string().url(),
            })
        )
        .default([]),
});

async function makeExecutable(filePath: string): Promise<void> {
    const stat = await fs.stat(filePath);
    await fs.chmod(filePath, stat.mode | 0o111);
}

/**
 * Download with the gh CLI, which uses its own stored credentials.
 * @returns false when gh is unavailable or the download did not produce the binary
 */
async function tryGhDownload(
    spec: ReleaseDependencySpec,
    assetName: string,
    installDir: string,
    binaryPath: string,
    environment: InstallerEnvironment
): Promise<boolean> {
    if (!(await environment.findOnPath('gh'))) {
        return false;
    }

    try {
        const result = await environment.runCommand('gh', [
            'release',
            'download',
            spec.tag,
            '--repo',
            spec.repo,
            '--pattern',
            assetName,
            '--dir',
            installDir,
            '--clobber',
        ]);
        if (result.exitCode !== 0) {
            environment.logger.debug(`gh release download failed: ${result.stderr.trim()}`);
            return false;
        }
    } catch (error) {
        environment.logger.debug(`gh release download failed: ${toErrorMessage(error)}`);
        return false;
    }

    const downloaded = path.join(installDir, assetName);
    if (downloaded !== binaryPath && existsSync(downloaded)) {
        await fs.rename(downloaded, binaryPath);
    }
    if (!existsSync(binaryPath)) {
        return false;
    }
    await makeExecutable(binaryPath);
    return true;
}

function githubHeaders(environment: InstallerEnvironment): Record<string, string> {
    const headers: Record<string, string> = {
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
    };
    const token = environment.env.GITHUB_TOKEN?.trim();
    if (token) {
        headers.Authorization = `Bearer ${token}`;
    }
    return headers;
}

async function downloadViaApi(
    spec: ReleaseDependencySpec,
    assetName: string,
    binaryPath: string,
    environment: InstallerEnvironment
): Promise<DependencyInstallResult> {
    const source = `${spec.repo}@${spec.tag}`;
    const headers = githubHeaders(environment);
    const releaseUrl = `${GITHUB_API_URL}/repos/${spec.repo}/releases/tags/${encodeURIComponent(spec.tag)}`;

    let body: unknown;
    try {
        const response = await environment.fetch(releaseUrl, { headers });
        if (!response.ok) {
            const reason = `GitHub API error ${response.status} for ${source}`;
            if (response.status === 401 || response.status === 403) {
                return failedResult(
                    spec,
                    InstallerErrorCode.RELEASE_AUTH_REQUIRED,
                    reason,
                    'Set GITHUB_TOKEN or run `gh auth login`'
                );
            }
            if (response.status === 404) {
                return failedResult(
                    spec,
                    InstallerErrorCode.RELEASE_NOT_FOUND,
                    `${reason} (release not found)`,
                    'Check the repository and tag, and that you have access to it'
                );
            }
            return failedResult(
                spec,
                InstallerErrorCode.RELEASE_API_ERROR,
                reason,
                `Download ${assetName} from https://github.com/${spec.repo}/releases manually`
            );
        }
        body = await response.json();
    } catch (error) {
        return failedResult(
            spec,
            InstallerErrorCode.RELEASE_API_ERROR,
            toErrorMessage(error),
            'Check your network connection and retry'
        );
    }

    const release = GitHubReleaseSchema.safeParse(body);
    if (!release.success) {
        return failedResult(
            spec,
            InstallerErrorCode.RELEASE_API_ERROR,
            `Unexpected GitHub API response for ${source}`,
            `Download ${assetName} from https://github.com/${spec.repo}/releases manually`
        );
    }

    const assets = release.data.assets;
    const asset = assets.find((candidate) => candidate.name === assetName);
    if (!asset) {
        return failedResult(
            spec,
            InstallerErrorCode.ASSET_NOT_FOUND,
            `No asset matching '${assetName}' found in ${source}. Available: ${assets.map((a) => a.name).join(', ')}`,
            'Check the asset template in the catalog entry'
        );
    }

    try {
        const response = await environment.fetch(asset.browser_download_url, { headers });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status} downloading ${asset.name}`);
        }
        await fs.writeFile(binaryPath, Buffer.from(await response.arrayBuffer()));
        await makeExecutable(binaryPath);
    } catch (error) {
        await fs.rm(binaryPath, { force: true });
        return failedResult(
            spec,
            InstallerErrorCode.DOWNLOAD_FAILED,
            toErrorMessage(error),
            `Download ${asset.browser_download_url} to ${binaryPath} and make it executable`
        );
    }
    return installedResult(spec, binaryPath);
}

/**
 * Download a prebuilt binary from a GitHub release into `installDir/binary`.
 */
export const installReleaseAsset: SystemDependencyInstaller<'github-release'> = async (
    spec,
    environment
) => {
    const installDir = path.resolve(expandHome(spec.installDir));
    const assetName = resolveAssetName(spec.asset, environment.platform, environment.arch);
    const binaryPath = path.join(installDir, spec.binary);

    try {
        await fs.mkdir(installDir, { recursive: true });
    } catch (error) {
        return failedResult(
            spec,
            InstallerErrorCode.DOWNLOAD_FAILED,
            `Cannot create ${installDir}: ${toErrorMessage(error)}`,
            'Choose a writable installDir'
        );
    }

    environment.logger.info(`Downloading ${assetName} from ${spec.repo}@${spec.tag}`);
    if (await tryGhDownload(spec, assetName, installDir, binaryPath, environment)) {
        return installedResult(spec, binaryPath);
    }
    return downloadViaApi(spec, assetName, binaryPath, environment);
};
