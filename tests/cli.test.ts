import { InvalidArgumentError } from 'commander';
import { CliOptions, buildProgram, parseCount, parsePositive } from '../src/cli';
import { DEFAULT_NSTRIKES } from '../src/services/strikeWindow';

const parse = (args: string[]) => buildProgram().parse(args, { from: 'user' }).opts<CliOptions>();

describe('cli options', () => {
    it('verifies TLS and writes both outputs by default', () => {
        const options = parse(['--symbol', 'NIFTY']);

        expect(options.verify).toBe(true);
        expect(options.workbook).toBe(true);
        expect(options.json).toBe(true);
        expect(options.nstrikes).toBe(DEFAULT_NSTRIKES);
        expect(options.multiple).toBeUndefined();
        expect(options.serve).toBeUndefined();
    });

    it('reads the switches and numeric flags', () => {
        const options = parse([
            '--no-verify',
            '--nstrikes',
            '5',
            '--multiple',
            '100',
            '--interval',
            '60',
            '--no-json',
            '--serve',
        ]);

        expect(options.verify).toBe(false);
        expect(options.nstrikes).toBe(5);
        expect(options.multiple).toBe(100);
        expect(options.interval).toBe(60);
        expect(options.json).toBe(false);
        expect(options.serve).toBe(true);
    });

    it('takes a port for the live feed', () => {
        expect(parse(['--serve', '4000']).serve).toBe(4000);
    });
});

describe('numeric flag parsers', () => {
    it('accepts whole numbers', () => {
        expect(parseCount('0')).toBe(0);
        expect(parsePositive('20')).toBe(20);
    });

    it('rejects negatives, fractions and zero where a positive is needed', () => {
        expect(() => parseCount('-1')).toThrow(InvalidArgumentError);
        expect(() => parseCount('2.5')).toThrow(InvalidArgumentError);
        expect(() => parsePositive('0')).toThrow(InvalidArgumentError);
    });
});
