import { SnapshotStore } from '../sinks/socketSink';

/** The part of an express response the controller uses. */
export interface JsonResponse {
    status(code: number): JsonResponse;
    json(body: unknown): unknown;
}

const NOT_READY = { error: 'No option chain snapshot yet, the first poll has not completed' };

export class OptionChainController {
    private store: SnapshotStore;

    constructor(store: SnapshotStore) {
        this.store = store;
    }

    public getOptionChain(_req: unknown, res: JsonResponse): void {
        const latest = this.store.get();
        if (!latest) {
            res.status(503).json(NOT_READY);
            return;
        }
        res.status(200).json(latest);
    }

    public getMetrics(_req: unknown, res: JsonResponse): void {
        const latest = this.store.get();
        if (!latest) {
            res.status(503).json(NOT_READY);
            return;
        }
        res.status(200).json(latest.metrics);
    }
}
