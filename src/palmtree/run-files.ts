import * as path from 'node:path';
import { RUN_FILE_EXTENSIONS } from './format.js';

export type RunDataKind = keyof typeof RUN_FILE_EXTENSIONS;

/**
 * A run is stored as sibling files sharing one base name (`run.src`,
 * `run.dat`, `run.prm`). Given any of them, or the bare base name, returns the
 * path of the requested data file.
 */
export function resolveRunDataPath(filePath: string, kind: RunDataKind): string {
    const parsed = path.parse(filePath);
    return path.join(parsed.dir, parsed.name + RUN_FILE_EXTENSIONS[kind]);
}
