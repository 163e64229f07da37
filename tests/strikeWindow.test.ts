import { inWindow, roundHalfEven, strikeMultiple, strikeWindow } from '../src/services/strikeWindow';

describe('strikeMultiple', () => {
    it('uses the known spacing for indices not on 50-point steps', () => {
        expect(strikeMultiple('BANKNIFTY')).toBe(100);
        expect(strikeMultiple('midcpnifty')).toBe(25);
        expect(strikeMultiple(' NIFTYNXT50 ')).toBe(100);
    });

    it('falls back to 50 for anything else', () => {
        expect(strikeMultiple('NIFTY')).toBe(50);
        expect(strikeMultiple('RELIANCE')).toBe(50);
    });
});

describe('roundHalfEven', () => {
    it('rounds to the nearest integer', () => {
        expect(roundHalfEven(496.74)).toBe(497);
        expect(roundHalfEven(496.2)).toBe(496);
    });

    it('sends exact halves to the even neighbour', () => {
        expect(roundHalfEven(496.5)).toBe(496);
        expect(roundHalfEven(497.5)).toBe(498);
        expect(roundHalfEven(0.5)).toBe(0);
    });
});

describe('strikeWindow', () => {
    it('centres the window on the rounded ATM strike', () => {
        expect(strikeWindow(24837, 50, 2)).toEqual({ multiple: 50, atm: 24850, low: 24750, high: 24950 });
    });

    it('rounds an underlying exactly between two strikes to the even multiple', () => {
        // 24825 / 50 = 496.5
        expect(strikeWindow(24825, 50, 1)).toEqual({ multiple: 50, atm: 24800, low: 24750, high: 24850 });
        // 24875 / 50 = 497.5
        expect(strikeWindow(24875, 50, 0).atm).toBe(24900);
    });

    it('collapses to the ATM strike when no strikes are requested', () => {
        expect(strikeWindow(51234, 100, 0)).toEqual({ multiple: 100, atm: 51200, low: 51200, high: 51200 });
    });

    it('rejects a non-positive multiple or a bad strike count', () => {
        expect(() => strikeWindow(24837, 0, 2)).toThrow(RangeError);
        expect(() => strikeWindow(24837, 50, -1)).toThrow(RangeError);
        expect(() => strikeWindow(24837, 50, 1.5)).toThrow(RangeError);
    });

    it('treats both bounds as inside', () => {
        const window = strikeWindow(24837, 50, 2);
        expect(inWindow(24750, window)).toBe(true);
        expect(inWindow(24950, window)).toBe(true);
        expect(inWindow(24700, window)).toBe(false);
        expect(inWindow(25000, window)).toBe(false);
    });
});
