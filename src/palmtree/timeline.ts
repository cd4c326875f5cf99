import { COLUMN_ELAPSED, COLUMN_PACKAGE_ID } from './format.js';
import { TimelineError } from './errors.js';
import type { SampleMatrix } from './matrix.js';
import type { PalmtreeHeader, PalmtreeLogger } from './types.js';
import { defaultLogger } from '../logger.js';

/**
 * - `elapsed-and-sample-rate`: counts back from each package's elapsed time at
 *   the nominal sample rate. Versions 2 and 3 only; unsuited to packages that
 *   arrive at irregular intervals or out of order.
 * - `zero-linear-sample-rate`: starts at 0 and steps forward at the nominal
 *   sample rate. Assumes there are no gaps in the data.
 */
export type TimelineMethod = 'elapsed-and-sample-rate' | 'zero-linear-sample-rate';

export const TIMELINE_METHODS: readonly TimelineMethod[] = ['elapsed-and-sample-rate', 'zero-linear-sample-rate'];

function validate(header: PalmtreeHeader, data: SampleMatrix, method: TimelineMethod, log: PalmtreeLogger): void {
    if (data.rows === 0) {
        throw new TimelineError('Empty data matrix');
    }
    if (method === 'elapsed-and-sample-rate' && header.version === 1) {
        throw new TimelineError(
            "Cannot apply the 'elapsed-and-sample-rate' method to version 1 data, its elapsed times are not precise enough. Use 'zero-linear-sample-rate' instead."
        );
    }
    if (header.kind !== 'pipeline') return;

    if (header.numPlaybackStreams === 0) {
        throw new TimelineError('Pipeline input streams are required to build a reliable timeline, enable logging of the pipeline input streams.');
    }
    if (header.version === 1 || header.maxSamplesStream <= 1 || header.streams.length === 0) return;

    const first = header.streams[0].samplesPerPackage;
    if (header.streams.every((s) => s.samplesPerPackage === first)) return;
    if (header.maxSamplesStream > first) {
        throw new TimelineError(
            'At least one stream has more samples per package than the pipeline input stream; timestamps based on the input stream would be wrong.'
        );
    }
    log.warn?.('Not all streams have the same number of samples per package; timestamps follow the pipeline input stream and may not fit the other streams.');
}

/**
 * Places every row of a decoded matrix on a timeline in milliseconds.
 */
export function generateTimeline(
    header: PalmtreeHeader,
    data: SampleMatrix,
    method: TimelineMethod,
    logger?: PalmtreeLogger | null
): Float64Array {
    validate(header, data, method, logger ?? defaultLogger);
    const step = 1000 / header.sampleRate;

    if (method === 'zero-linear-sample-rate') {
        const stamps = new Float64Array(data.rows);
        for (let i = 0; i < data.rows; i++) stamps[i] = i * step;
        return stamps;
    }

    const elapsed = data.column(COLUMN_ELAPSED);
    if (header.version === 1 || header.maxSamplesStream === 1) {
        return elapsed;
    }

    // rows of one package share an id; the package's elapsed time belongs to its last sample
    const ids = data.column(COLUMN_PACKAGE_ID);
    const stamps = new Float64Array(data.rows);
    let start = 0;
    while (start < data.rows) {
        let end = start + 1;
        while (end < data.rows && ids[end] === ids[start]) end++;
        const n = end - start;
        for (let k = 0; k < n; k++) {
            stamps[start + k] = elapsed[start + k] - (n - 1 - k) * step;
        }
        start = end;
    }
    return stamps;
}
