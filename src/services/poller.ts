import { ChainResponse, OptionChainFetcher } from '../api/nse/client';
import { ChainPayload } from '../api/nse/types';
import { ChainSnapshot, Sink } from '../sinks/types';
import { PollCancelledError, RetryExhaustedError, isRetryable } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { Wait, waitWithProgress } from '../utils/progress';
import { ChainMetrics, Ratio, isIndeterminate, transformChain } from './chainTransform';

export type RetryOptions = {
    /** Consecutive failed attempts before giving up. */
    maxAttempts: number;
    retryDelaySeconds: number;
    signal?: AbortSignal;
    wait?: Wait;
    logger?: Logger;
};

/**
 * Fetch the chain, retrying network and parse failures after a fixed delay.
 * Throws RetryExhaustedError once `maxAttempts` consecutive attempts failed
 * and PollCancelledError when the signal aborts while waiting.
 */
export const fetchWithRetry = async (
    fetcher: OptionChainFetcher,
    symbol: string,
    { maxAttempts, retryDelaySeconds, signal, wait = waitWithProgress, logger = defaultLogger }: RetryOptions,
): Promise<ChainResponse> => {
    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) throw new PollCancelledError();
        try {
            return await fetcher.fetchOptionChain(symbol);
        } catch (error) {
            if (!isRetryable(error)) throw error;
            if (attempt >= maxAttempts) throw new RetryExhaustedError(symbol, attempt, error);

            logger.warn(`[NSE] ${error.name}: ${error.message} (attempt ${attempt}/${maxAttempts})`);
            await wait(retryDelaySeconds, 'Retrying...', signal);
        }
    }
};

const formatRatio = (value: Ratio) => (isIndeterminate(value) ? value : value.toFixed(3));

const money = (value: number) =>
    `₹ ${value.toLocaleString('en-IN', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

/** Multi-line cycle summary printed after every successful transform. */
export const describeCycle = (metrics: ChainMetrics, rowCount: number): string =>
    [
        `Data fetched for ${metrics.symbol} (${metrics.expiry})`,
        `  >> Underlying Value   : ${money(metrics.underlyingValue)}`,
        `  >> Response Timestamp : ${metrics.timestamp}`,
        `  >> ATM Strike Price   : ${money(metrics.window.atm)}`,
        `  >> Strike Price Range : ${money(metrics.window.low)} - ${money(metrics.window.high)}`,
        `  >> Strikes Paired     : ${rowCount}`,
        `  >> PCR / Near PCR     : ${formatRatio(metrics.putCallRatio)} / ${formatRatio(metrics.nearPcr)}`,
    ].join('\n');

/** Why a cycle produced no rows, naming the listed expiries when ours is not among them. */
export const emptyChainHint = (payload: ChainPayload, expiry: string): string => {
    const listed = payload.records.expiryDates;
    if (listed && listed.length > 0 && !listed.includes(expiry)) {
        return `Expiry ${expiry} is not listed; available: ${listed.slice(0, 6).join(', ')}`;
    }
    return `No strike around ATM has both a CE and a PE leg for ${expiry}`;
};

export type PollerOptions = {
    fetcher: OptionChainFetcher;
    symbol: string;
    expiry: string;
    nstrikes: number;
    multiple: number;
    sinks: readonly Sink[];
    intervalSeconds: number;
    maxAttempts: number;
    retryDelaySeconds: number;
    signal?: AbortSignal;
    wait?: Wait;
    logger?: Logger;
};

const writeAll = async (sinks: readonly Sink[], snapshot: ChainSnapshot, logger: Logger) => {
    for (const sink of sinks) {
        try {
            await sink.write(snapshot);
        } catch (error) {
            logger.error({ err: error }, `[SINK] ${sink.name} write failed`);
        }
    }
};

/**
 * Fetch → transform → write, then wait `intervalSeconds`, until the signal
 * aborts. Resolves with the number of cycles that wrote a snapshot.
 * RetryExhaustedError (and any non-retryable fetch error) propagates.
 */
export const runPoller = async (options: PollerOptions): Promise<number> => {
    const { fetcher, symbol, expiry, nstrikes, multiple, sinks, signal } = options;
    const wait = options.wait ?? waitWithProgress;
    const logger = options.logger ?? defaultLogger;

    let written = 0;
    while (!signal?.aborted) {
        let response: ChainResponse;
        try {
            response = await fetchWithRetry(fetcher, symbol, {
                maxAttempts: options.maxAttempts,
                retryDelaySeconds: options.retryDelaySeconds,
                signal,
                wait,
                logger,
            });
        } catch (error) {
            if (error instanceof PollCancelledError) break;
            throw error;
        }

        const { payload, raw } = response;
        const result = transformChain(payload, { expiry, nstrikes, multiple, symbol });
        if (result.ok) {
            const { rows, metrics } = result.value;
            logger.info(describeCycle(metrics, rows.length));
            if (rows.length === 0) {
                logger.warn(`[POLL] ${emptyChainHint(payload, expiry)}`);
            }
            await writeAll(sinks, { rows, metrics, payload, raw }, logger);
            written++;
        } else {
            logger.error({ detail: result.error.detail }, `[POLL] Skipping cycle: ${result.error.message}`);
        }

        if (signal?.aborted) break;
        await wait(options.intervalSeconds, 'Waiting to Refresh...', signal);
    }

    logger.info(`[POLL] Stopped after ${written} snapshot(s)`);
    return written;
};
