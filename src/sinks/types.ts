import { ChainPayload } from '../api/nse/types';
import { ChainMetrics, ChainTable, OptionChainRow } from '../services/chainTransform';

/** One cycle's result together with the response it was computed from. */
export type ChainSnapshot = ChainTable & {
    payload: ChainPayload;
    /** The decoded response body before validation. */
    raw: unknown;
};

/** What the live feed pushes and serves: the table without the raw response. */
export type ChainUpdate = {
    metrics: ChainMetrics;
    rows: OptionChainRow[];
};

export interface Sink {
    readonly name: string;
    write(snapshot: ChainSnapshot): Promise<void>;
}
