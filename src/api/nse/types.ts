import { z } from 'zod';

export type Side = 'CE' | 'PE';

/** The fourteen per-leg metrics, in the order the exchange's own chain shows them. */
export const LEG_METRICS = [
    'openInterest',
    'changeinOpenInterest',
    'pchangeinOpenInterest',
    'totalTradedVolume',
    'impliedVolatility',
    'lastPrice',
    'change',
    'pChange',
    'totalBuyQuantity',
    'totalSellQuantity',
    'bidQty',
    'bidprice',
    'askQty',
    'askPrice',
] as const;

export type LegMetric = (typeof LEG_METRICS)[number];

export type LegMetrics = Record<LegMetric, number>;

// NSE mostly sends numbers, occasionally numeric strings
const numeric = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z.number().finite(),
);

export const optionLegSchema = z.object({
    strikePrice: numeric,
    expiryDate: z.string(),
    underlying: z.string(),
    identifier: z.string(),
    underlyingValue: numeric,
    openInterest: numeric,
    changeinOpenInterest: numeric,
    pchangeinOpenInterest: numeric,
    totalTradedVolume: numeric,
    impliedVolatility: numeric,
    lastPrice: numeric,
    change: numeric,
    pChange: numeric,
    totalBuyQuantity: numeric,
    totalSellQuantity: numeric,
    bidQty: numeric,
    bidprice: numeric,
    askQty: numeric,
    askPrice: numeric,
});

export type OptionLeg = z.infer<typeof optionLegSchema>;

/** A leg tagged with the side it was found under. */
export type TaggedLeg = OptionLeg & { instrumentType: Side };

const sideTotalsSchema = z.object({
    totOI: numeric,
    totVol: numeric,
});

// Legs are validated by the transform so a bad leg surfaces as a DataShapeError
// rather than failing the whole fetch.
export const chainPayloadSchema = z.object({
    records: z.object({
        data: z.array(z.record(z.unknown())),
        timestamp: z.string(),
        underlyingValue: numeric,
        expiryDates: z.array(z.string()).optional(),
    }),
    filtered: z
        .object({
            CE: sideTotalsSchema.partial().optional(),
            PE: sideTotalsSchema.partial().optional(),
        })
        .optional(),
});

export type ChainPayload = z.infer<typeof chainPayloadSchema>;

export type ChainItem = ChainPayload['records']['data'][number];
