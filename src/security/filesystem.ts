import fs from 'fs';
import path from 'path';

/** Restituisce false se il filesystem non supporta i permessi POSIX (Windows, mount di rete). */
function chmodSafe(targetPath: string, mode: number): boolean {
    if (process.platform === 'win32') {
        return false;
    }
    try {
        fs.chmodSync(targetPath, mode);
        return true;
    } catch (error) {
        const code = error instanceof Error && 'code' in error ? String(error.code) : '';
        if (code === 'EPERM' || code === 'ENOTSUP' || code === 'EROFS') {
            return false;
        }
        throw error;
    }
}

export function ensureDirectoryPrivate(directoryPath: string): void {
    if (!fs.existsSync(directoryPath)) {
        fs.mkdirSync(directoryPath, { recursive: true });
    }
    chmodSafe(directoryPath, 0o700);
}

export function ensureParentDirectoryPrivate(filePath: string): void {
    ensureDirectoryPrivate(path.dirname(filePath));
}

export function ensureFilePrivate(filePath: string): void {
    if (!fs.existsSync(filePath)) {
        return;
    }
    chmodSafe(filePath, 0o600);
}

export function writePrivateFile(filePath: string, content: string | Buffer): void {
    ensureParentDirectoryPrivate(filePath);
    fs.writeFileSync(filePath, content);
    ensureFilePrivate(filePath);
}
