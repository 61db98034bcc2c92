import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Name of the running program, from the script path.
 * "/usr/local/bin/wikisearch" → "wikisearch", "dist/cli/index.js" → "index"
 */
export function getProgramName(argv: readonly string[] = process.argv): string {
    const script = argv[1];
    if (!script) return 'wikisearch';
    return basename(script, extname(script)) || 'wikisearch';
}

/**
 * Per-user scratch directory: `<tmp>/<user>/<program>`.
 */
export function getDefaultWorkingDir(
    programName: string = getProgramName(),
    env: NodeJS.ProcessEnv = process.env
): string {
    return join(tmpdir(), env['USER'] ?? 'unknown_user', programName);
}

/**
 * The `prompts/` directory shipped at the package root.
 * Resolves the same from `src/utils` and `dist/utils`.
 */
export function getDefaultPromptsDir(): string {
    return fileURLToPath(new URL('../../prompts', import.meta.url));
}
