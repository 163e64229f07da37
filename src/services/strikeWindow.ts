export type StrikeWindow = {
    multiple: number;
    atm: number;
    low: number;
    high: number;
};

export const DEFAULT_STRIKE_MULTIPLE = 50;

export const DEFAULT_NSTRIKES = 20;

// Strike spacing for the indices whose chain is not on 50-point steps
const STRIKE_MULTIPLES: Record<string, number> = {
    BANKNIFTY: 100,
    MIDCPNIFTY: 25,
    NIFTYNXT50: 100,
};

export const strikeMultiple = (symbol: string): number =>
    STRIKE_MULTIPLES[symbol.trim().toUpperCase()] ?? DEFAULT_STRIKE_MULTIPLE;

/**
 * Round to the nearest integer, sending exact halves to the even neighbour,
 * so 496.5 → 496 and 497.5 → 498.
 */
export const roundHalfEven = (value: number): number => {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
};

/**
 * ATM strike and the inclusive band of `nstrikes` strikes either side of it.
 */
export const strikeWindow = (underlyingValue: number, multiple: number, nstrikes: number): StrikeWindow => {
    if (!(multiple > 0)) {
        throw new RangeError(`Strike multiple must be positive, got ${multiple}`);
    }
    if (!Number.isInteger(nstrikes) || nstrikes < 0) {
        throw new RangeError(`Number of strikes must be a non-negative integer, got ${nstrikes}`);
    }

    const atm = roundHalfEven(underlyingValue / multiple) * multiple;
    return {
        multiple,
        atm,
        low: atm - nstrikes * multiple,
        high: atm + nstrikes * multiple,
    };
};

export const inWindow = (strikePrice: number, window: StrikeWindow): boolean =>
    strikePrice >= window.low && strikePrice <= window.high;
