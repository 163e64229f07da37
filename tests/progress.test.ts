import cliProgress from 'cli-progress';
import { waitWithProgress } from '../src/utils/progress';

describe('waitWithProgress', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('advances the bar once per second and returns early when aborted', async () => {
        const controller = new AbortController();
        const increment = jest.spyOn(cliProgress.SingleBar.prototype, 'increment');
        const stop = jest.spyOn(cliProgress.SingleBar.prototype, 'stop');
        let finished = false;

        const waiting = waitWithProgress(30, 'Waiting to Refresh...', controller.signal).then(() => {
            finished = true;
        });

        await jest.advanceTimersByTimeAsync(2500);
        expect(increment).toHaveBeenCalledTimes(2);
        expect(finished).toBe(false);

        controller.abort();
        await waiting;

        expect(finished).toBe(true);
        expect(increment).toHaveBeenCalledTimes(2);
        expect(stop).toHaveBeenCalledTimes(1);
        expect(jest.getTimerCount()).toBe(0);
    });

    it('runs the full countdown without a signal', async () => {
        const increment = jest.spyOn(cliProgress.SingleBar.prototype, 'increment');
        const stop = jest.spyOn(cliProgress.SingleBar.prototype, 'stop');

        const waiting = waitWithProgress(3, 'Retrying...');
        await jest.advanceTimersByTimeAsync(3000);
        await waiting;

        expect(increment).toHaveBeenCalledTimes(3);
        expect(stop).toHaveBeenCalledTimes(1);
        expect(jest.getTimerCount()).toBe(0);
    });

    it('does not start a bar for an already aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();
        const increment = jest.spyOn(cliProgress.SingleBar.prototype, 'increment');
        const stop = jest.spyOn(cliProgress.SingleBar.prototype, 'stop');

        await waitWithProgress(30, 'Waiting to Refresh...', controller.signal);

        expect(increment).not.toHaveBeenCalled();
        expect(stop).not.toHaveBeenCalled();
        expect(jest.getTimerCount()).toBe(0);
    });

    it('returns at once for a zero or negative duration', async () => {
        const start = jest.spyOn(cliProgress.SingleBar.prototype, 'start');

        await waitWithProgress(0, 'Retrying...');
        await waitWithProgress(-5, 'Retrying...');

        expect(start).not.toHaveBeenCalled();
        expect(jest.getTimerCount()).toBe(0);
    });
});
