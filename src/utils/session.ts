import { randomUUID } from 'crypto';
import dayjs from 'dayjs';

/** Short upper-case id used to keep output files from one run apart. */
export const shortId = (length: number): string => randomUUID().toUpperCase().slice(0, length);

export const today = (date: Date = new Date()): string => dayjs(date).format('YYYY-MM-DD');

/** Colons are not allowed in file names on every platform. */
export const fileSafeTimestamp = (timestamp: string): string => timestamp.replace(/:/g, '');
