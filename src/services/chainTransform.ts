import {
    ChainItem,
    ChainPayload,
    LEG_METRICS,
    LegMetric,
    OptionLeg,
    Side,
    TaggedLeg,
    optionLegSchema,
} from '../api/nse/types';
import { DataShapeError } from '../utils/errors';
import { StrikeWindow, inWindow, strikeWindow } from './strikeWindow';

const SIDES: readonly Side[] = ['CE', 'PE'];

export const INDETERMINATE = 'indeterminate' as const;

/** A put-call ratio, or the marker used when call open interest is zero. */
export type Ratio = number | typeof INDETERMINATE;

type CallColumns = { [K in LegMetric as `${K}_ce`]: number };
type PutColumns = { [K in LegMetric as `${K}_pe`]: number };

export type OptionChainRow = CallColumns & { strikePrice: number } & PutColumns;

export type OptionChainColumn = keyof OptionChainRow;

/**
 * Column layout of every row: calls in metric order, the strike, then puts in
 * reverse metric order so the sheet reads symmetrically out from the strike.
 */
export const OPTION_CHAIN_COLUMNS: readonly OptionChainColumn[] = [
    ...LEG_METRICS.map((metric) => `${metric}_ce` as const),
    'strikePrice',
    ...[...LEG_METRICS].reverse().map((metric) => `${metric}_pe` as const),
];

export type TotalsSource = 'filtered' | 'computed';

export type ChainMetrics = Readonly<{
    symbol: string;
    expiry: string;
    timestamp: string;
    underlyingValue: number;
    window: Readonly<StrikeWindow>;
    nstrikes: number;
    totOiCe: number;
    totOiPe: number;
    totVolCe: number;
    totVolPe: number;
    totalsSource: TotalsSource;
    nearOiCe: number;
    nearOiPe: number;
    nearVolCe: number;
    nearVolPe: number;
    putCallRatio: Ratio;
    nearPcr: Ratio;
}>;

export type ChainTable = {
    rows: OptionChainRow[];
    metrics: ChainMetrics;
};

export type TransformResult<T> = { ok: true; value: T } | { ok: false; error: DataShapeError };

export type TransformParams = {
    /** Exact `expiryDate` text to keep, e.g. `28-Oct-2026`. */
    expiry: string;
    nstrikes: number;
    multiple: number;
    symbol?: string;
};

type Totals = {
    totOiCe: number;
    totOiPe: number;
    totVolCe: number;
    totVolPe: number;
    totalsSource: TotalsSource;
};

const sum = (legs: readonly OptionLeg[], metric: LegMetric): number =>
    legs.reduce((acc, leg) => acc + leg[metric], 0);

export const ratio = (numerator: number, denominator: number): Ratio => {
    if (denominator === 0 || !Number.isFinite(numerator) || !Number.isFinite(denominator)) {
        return INDETERMINATE;
    }
    return numerator / denominator;
};

export const isIndeterminate = (value: Ratio): value is typeof INDETERMINATE => value === INDETERMINATE;

// A leg's own expiryDate wins over the item's
const expiryOf = (item: ChainItem, raw: unknown): unknown => {
    if (typeof raw === 'object' && raw !== null && 'expiryDate' in raw) return raw.expiryDate;
    return item.expiryDate;
};

/**
 * Pull every CE/PE leg out of `records.data`, tagging each with its side.
 * Items carrying neither side are skipped. The payload is not modified.
 *
 * With `expiry`, legs dated for another expiry are skipped unvalidated.
 */
export const flattenRecords = (payload: ChainPayload, expiry?: string): TransformResult<TaggedLeg[]> => {
    const legs: TaggedLeg[] = [];

    for (const [index, item] of payload.records.data.entries()) {
        for (const side of SIDES) {
            if (!(side in item)) continue;

            const raw = item[side];
            const legExpiry = expiryOf(item, raw);
            if (expiry !== undefined && typeof legExpiry === 'string' && legExpiry !== expiry) continue;

            const parsed = optionLegSchema.safeParse(raw);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                const field = issue ? issue.path.join('.') : '';
                const strike = item.strikePrice;
                return {
                    ok: false,
                    error: new DataShapeError(
                        `Malformed ${side} leg at records.data[${index}]${field ? ` (${field})` : ''}: ${issue?.message ?? 'invalid'}`,
                        {
                            side,
                            strikePrice: typeof strike === 'number' ? strike : undefined,
                            path: `records.data[${index}].${side}${field ? `.${field}` : ''}`,
                        },
                    ),
                };
            }

            legs.push({ ...parsed.data, instrumentType: side });
        }
    }

    return { ok: true, value: legs };
};

const findDuplicate = (legs: readonly TaggedLeg[]): TaggedLeg | undefined => {
    const seen = new Set<string>();
    for (const leg of legs) {
        const key = `${leg.instrumentType}:${leg.strikePrice}`;
        if (seen.has(key)) return leg;
        seen.add(key);
    }
    return undefined;
};

// The exchange's own aggregates cover the whole expiry; only use them when complete.
const trustedTotals = (payload: ChainPayload): Totals | undefined => {
    const ce = payload.filtered?.CE ?? {};
    const pe = payload.filtered?.PE ?? {};
    const { totOI: totOiCe, totVol: totVolCe } = ce;
    const { totOI: totOiPe, totVol: totVolPe } = pe;
    if (totOiCe === undefined || totVolCe === undefined || totOiPe === undefined || totVolPe === undefined) {
        return undefined;
    }
    return { totOiCe, totOiPe, totVolCe, totVolPe, totalsSource: 'filtered' };
};

const computedTotals = (calls: readonly OptionLeg[], puts: readonly OptionLeg[]): Totals => ({
    totOiCe: sum(calls, 'openInterest'),
    totOiPe: sum(puts, 'openInterest'),
    totVolCe: sum(calls, 'totalTradedVolume'),
    totVolPe: sum(puts, 'totalTradedVolume'),
    totalsSource: 'computed',
});

const toRow = (call: OptionLeg, put: OptionLeg): OptionChainRow => ({
    openInterest_ce: call.openInterest,
    changeinOpenInterest_ce: call.changeinOpenInterest,
    pchangeinOpenInterest_ce: call.pchangeinOpenInterest,
    totalTradedVolume_ce: call.totalTradedVolume,
    impliedVolatility_ce: call.impliedVolatility,
    lastPrice_ce: call.lastPrice,
    change_ce: call.change,
    pChange_ce: call.pChange,
    totalBuyQuantity_ce: call.totalBuyQuantity,
    totalSellQuantity_ce: call.totalSellQuantity,
    bidQty_ce: call.bidQty,
    bidprice_ce: call.bidprice,
    askQty_ce: call.askQty,
    askPrice_ce: call.askPrice,
    strikePrice: call.strikePrice,
    askPrice_pe: put.askPrice,
    askQty_pe: put.askQty,
    bidprice_pe: put.bidprice,
    bidQty_pe: put.bidQty,
    totalSellQuantity_pe: put.totalSellQuantity,
    totalBuyQuantity_pe: put.totalBuyQuantity,
    pChange_pe: put.pChange,
    change_pe: put.change,
    lastPrice_pe: put.lastPrice,
    impliedVolatility_pe: put.impliedVolatility,
    totalTradedVolume_pe: put.totalTradedVolume,
    pchangeinOpenInterest_pe: put.pchangeinOpenInterest,
    changeinOpenInterest_pe: put.changeinOpenInterest,
    openInterest_pe: put.openInterest,
});

/** Row values in `OPTION_CHAIN_COLUMNS` order, for tabular sinks. */
export const rowValues = (row: OptionChainRow): number[] => OPTION_CHAIN_COLUMNS.map((column) => row[column]);

/**
 * Reduce a raw chain payload to the strikes around ATM for one expiry, with
 * calls and puts paired on each row, plus the aggregate metrics.
 *
 * Data problems come back as `{ ok: false }`; a RangeError is thrown only when
 * `nstrikes` or `multiple` are out of range.
 */
export const transformChain = (payload: ChainPayload, params: TransformParams): TransformResult<ChainTable> => {
    const { expiry, nstrikes, multiple } = params;
    const window = strikeWindow(payload.records.underlyingValue, multiple, nstrikes);

    const flattened = flattenRecords(payload, expiry);
    if (!flattened.ok) return flattened;

    const forExpiry = flattened.value.filter((leg) => leg.expiryDate === expiry);

    const duplicate = findDuplicate(forExpiry);
    if (duplicate) {
        return {
            ok: false,
            error: new DataShapeError(
                `Duplicate ${duplicate.instrumentType} leg for strike ${duplicate.strikePrice} on ${expiry}`,
                { side: duplicate.instrumentType, strikePrice: duplicate.strikePrice },
            ),
        };
    }

    // totals come from the whole expiry, so they must be taken before windowing
    const totals =
        trustedTotals(payload) ??
        computedTotals(
            forExpiry.filter((leg) => leg.instrumentType === 'CE'),
            forExpiry.filter((leg) => leg.instrumentType === 'PE'),
        );

    const near = forExpiry.filter((leg) => inWindow(leg.strikePrice, window));
    const calls = near.filter((leg) => leg.instrumentType === 'CE');
    const puts = near.filter((leg) => leg.instrumentType === 'PE');

    const putsByStrike = new Map(puts.map((leg) => [leg.strikePrice, leg]));
    const rows: OptionChainRow[] = [];
    for (const call of [...calls].sort((a, b) => a.strikePrice - b.strikePrice)) {
        const put = putsByStrike.get(call.strikePrice);
        if (put) rows.push(toRow(call, put));
    }

    const nearOiCe = sum(calls, 'openInterest');
    const nearOiPe = sum(puts, 'openInterest');

    const metrics: ChainMetrics = Object.freeze({
        symbol: params.symbol ?? flattened.value[0]?.underlying ?? '',
        expiry,
        timestamp: payload.records.timestamp,
        underlyingValue: payload.records.underlyingValue,
        window: Object.freeze({ ...window }),
        nstrikes,
        ...totals,
        nearOiCe,
        nearOiPe,
        nearVolCe: sum(calls, 'totalTradedVolume'),
        nearVolPe: sum(puts, 'totalTradedVolume'),
        putCallRatio: ratio(totals.totOiPe, totals.totOiCe),
        nearPcr: ratio(nearOiPe, nearOiCe),
    });

    return { ok: true, value: { rows, metrics } };
};
