import fs from 'fs';
import path from 'path';
import { fileSafeTimestamp, shortId } from '../utils/session';
import { ChainSnapshot, Sink } from './types';

export const snapshotFileName = (symbol: string, id: string, timestamp: string): string =>
    `${symbol} #${id} at ${fileSafeTimestamp(timestamp)}.json`;

/**
 * Writes every snapshot to its own JSON file: the metrics, the paired rows and
 * the untouched response, so a cycle can be replayed later.
 */
export class JsonSnapshotSink implements Sink {
    readonly name = 'json';
    private readonly dir: string;
    private readonly newId: () => string;

    constructor(dir: string, newId: () => string = () => shortId(7)) {
        this.dir = dir;
        this.newId = newId;
    }

    async write({ metrics, rows, raw }: ChainSnapshot): Promise<void> {
        await fs.promises.mkdir(this.dir, { recursive: true });
        const file = path.join(this.dir, snapshotFileName(metrics.symbol, this.newId(), metrics.timestamp));
        const body = { metrics, rows, response: raw };
        await fs.promises.writeFile(file, `${JSON.stringify(body, null, 2)}\n`, 'utf8');
    }
}
