import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

/** Expiry text as the exchange writes it, e.g. `28-Oct-2026`. */
export const EXPIRY_FORMAT = 'DD-MMM-YYYY';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const DAY_MONTH_YEAR = /^(\d{1,2})[-\s/]([A-Za-z]{3})[-\s/](\d{4})$/;

/**
 * Bring a user supplied expiry to the exchange's `DD-MMM-YYYY` text, which is
 * what the transform matches on. Accepts dates, `YYYY-MM-DD`, and day-month-year
 * text with any month case or an unpadded day. Returns undefined when the
 * input is not a real date.
 */
export const normalizeExpiry = (input: string | Date): string | undefined => {
    if (input instanceof Date) {
        const date = dayjs(input);
        return date.isValid() ? date.format(EXPIRY_FORMAT) : undefined;
    }

    const text = input.trim();
    const match = DAY_MONTH_YEAR.exec(text);
    if (match) {
        const [, day, month, year] = match;
        const monthIndex = MONTHS.findIndex((name) => name.toLowerCase() === month.toLowerCase());
        if (monthIndex === -1) return undefined;
        const date = dayjs(`${year}-${String(monthIndex + 1).padStart(2, '0')}-${day.padStart(2, '0')}`, 'YYYY-MM-DD', true);
        return date.isValid() ? date.format(EXPIRY_FORMAT) : undefined;
    }

    const iso = dayjs(text, 'YYYY-MM-DD', true);
    return iso.isValid() ? iso.format(EXPIRY_FORMAT) : undefined;
};
