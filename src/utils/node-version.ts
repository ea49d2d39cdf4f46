/**
 * Node.js version check utility
 * Ensures the CLI runs on a supported Node.js version
 */

export const MIN_NODE_VERSION = 20;

export function isSupportedNodeVersion(version: string = process.versions.node): boolean {
    const majorVersion = parseInt(version.split('.')[0] ?? '0', 10);
    return Number.isFinite(majorVersion) && majorVersion >= MIN_NODE_VERSION;
}

/**
 * Check if the current Node.js version meets minimum requirements.
 * Exits with a helpful error message if not.
 */
export function checkNodeVersion(): void {
    const currentVersion = process.versions.node;

    if (!isSupportedNodeVersion(currentVersion)) {
        console.error(`
╔══════════════════════════════════════════════════════════════╗
║  stageline requires Node.js ${MIN_NODE_VERSION} or higher                     ║
╠══════════════════════════════════════════════════════════════╣
║  Current version: ${currentVersion.padEnd(43)}║
║  Required:        ${MIN_NODE_VERSION}.0.0 or higher${' '.repeat(27)}║
║                                                              ║
║  Please upgrade Node.js: https://nodejs.org                  ║
╚══════════════════════════════════════════════════════════════╝
`);
        process.exit(1);
    }
}
