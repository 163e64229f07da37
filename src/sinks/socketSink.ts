import { ChainSnapshot, ChainUpdate, Sink } from './types';

export interface Broadcaster {
    broadcast(update: ChainUpdate): void;
}

/** Most recent cycle, served to clients that connect or ask between pushes. */
export class SnapshotStore {
    private latest?: ChainUpdate;

    set(update: ChainUpdate): void {
        this.latest = update;
    }

    get(): ChainUpdate | undefined {
        return this.latest;
    }
}

export class SocketSink implements Sink {
    readonly name = 'socket';
    private readonly store: SnapshotStore;
    private readonly broadcaster: Broadcaster;

    constructor(store: SnapshotStore, broadcaster: Broadcaster) {
        this.store = store;
        this.broadcaster = broadcaster;
    }

    async write({ metrics, rows }: ChainSnapshot): Promise<void> {
        const update: ChainUpdate = { metrics, rows };
        this.store.set(update);
        this.broadcaster.broadcast(update);
    }
}
