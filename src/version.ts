import { readFileSync } from 'fs';

function readVersion(): string {
    try {
        const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
        const parsed: unknown = JSON.parse(raw);
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
            return parsed.version;
        }
    } catch {
        // running from an unusual layout; fall through
    }
    return '0.0.0';
}

export const VERSION = readVersion();
