import { describe, it, expect } from 'vitest';
import { resolveAssetName } from './platform.js';

describe('resolveAssetName', () => {
    it('should substitute release names for the OS and architecture', () => {
        expect(resolveAssetName('scanner_{os}_{arch}.tar.gz', 'darwin', 'arm64')).toBe(
            'scanner_darwin_arm64.tar.gz'
        );
        expect(resolveAssetName('scanner_{os}_{arch}', 'linux', 'x64')).toBe('scanner_linux_amd64');
        expect(resolveAssetName('scanner-{os}-{arch}.exe', 'win32', 'x64')).toBe(
            'scanner-windows-amd64.exe'
        );
    });

    it('should pass unknown platforms through unchanged', () => {
        expect(resolveAssetName('{os}/{arch}/{os}', 'freebsd', 'ppc64')).toBe('freebsd/ppc64/freebsd');
    });

    it('should leave templates without placeholders alone', () => {
        expect(resolveAssetName('scanner', 'linux', 'arm64')).toBe('scanner');
    });
});
