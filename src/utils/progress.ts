import cliProgress from 'cli-progress';

export type Wait = (seconds: number, label: string, signal?: AbortSignal) => Promise<void>;

const sleep = (ms: number, signal?: AbortSignal) =>
    new Promise<void>((resolve) => {
        if (signal?.aborted) return resolve();
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

/**
 * Sleep `seconds` in one-second steps behind a progress bar. Returns early,
 * without throwing, once `signal` aborts.
 */
export const waitWithProgress: Wait = async (seconds, label, signal) => {
    if (seconds <= 0 || signal?.aborted) return;

    const bar = new cliProgress.SingleBar(
        { format: `${label} [{bar}] {value}/{total}s`, clearOnComplete: true, hideCursor: true },
        cliProgress.Presets.shades_classic,
    );
    bar.start(seconds, 0);
    try {
        for (let elapsed = 0; elapsed < seconds; elapsed++) {
            await sleep(1000, signal);
            if (signal?.aborted) return;
            bar.increment();
        }
    } finally {
        bar.stop();
    }
};
