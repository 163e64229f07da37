#!/usr/bin/env node
import path from 'path';
import readline from 'readline/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import config from './config';
import { CHAIN_TYPES, ChainType, loadFetcherSettings } from './config/source';
import { createNseClient } from './api/nse/optionChain';
import { runPoller } from './services/poller';
import { DEFAULT_NSTRIKES, strikeMultiple } from './services/strikeWindow';
import { createLiveFeed, LiveFeed } from './server';
import { JsonSnapshotSink } from './sinks/jsonSnapshotSink';
import { Sink } from './sinks/types';
import { WorkbookSink, workbookFileName } from './sinks/workbookSink';
import { ConfigError } from './utils/errors';
import { normalizeExpiry } from './utils/expiry';
import { logger } from './utils/logger';
import { today } from './utils/session';

export type CliOptions = {
    symbol?: string;
    expiry?: string;
    verify: boolean;
    config?: string;
    type?: ChainType;
    nstrikes: number;
    multiple?: number;
    interval: number;
    retryDelay: number;
    maxAttempts: number;
    timeout: number;
    outDir: string;
    template: string;
    workbook: boolean;
    json: boolean;
    serve?: number | true;
};

export const parseCount = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a whole number, 0 or more.');
    }
    return parsed;
};

export const parsePositive = (value: string): number => {
    const parsed = parseCount(value);
    if (parsed === 0) throw new InvalidArgumentError('Expected a whole number above 0.');
    return parsed;
};

export const buildProgram = (): Command =>
    new Command()
        .name('option-chain-poller')
        .description('Poll the NSE option chain and write the strikes around ATM to a workbook and JSON snapshots')
        .option('--symbol <symbol>', 'index or stock symbol (prompted when omitted)')
        .option('--expiry <date>', 'expiry as DD-MMM-YYYY or YYYY-MM-DD (prompted when omitted)')
        .option('--no-verify', 'skip TLS certificate verification')
        .option('--config <file>', 'YAML file merged over config/default.yaml', config.OC_CONFIG)
        .addOption(new Option('--type <type>', 'option chain endpoint to use').choices(CHAIN_TYPES))
        .option('--nstrikes <count>', 'strikes kept either side of ATM', parseCount, DEFAULT_NSTRIKES)
        .option('--multiple <points>', 'strike spacing (defaults by symbol)', parsePositive)
        .option('--interval <seconds>', 'seconds between polls', parsePositive, config.OC_POLL_SECONDS)
        .option('--retry-delay <seconds>', 'seconds between failed fetches', parseCount, config.OC_RETRY_SECONDS)
        .option('--max-attempts <count>', 'consecutive failed fetches before giving up', parsePositive, config.OC_MAX_ATTEMPTS)
        .option('--timeout <ms>', 'request timeout in milliseconds', parsePositive, config.OC_TIMEOUT_MS)
        .option('--out-dir <dir>', 'output directory', config.OC_OUTPUT_DIR)
        .option('--template <file>', 'workbook template to copy', config.OC_TEMPLATE)
        .option('--no-workbook', 'do not write the session workbook')
        .option('--no-json', 'do not write JSON snapshots')
        .option('--serve [port]', `serve the latest snapshot over HTTP and socket.io (default port ${config.PORT})`, parsePositive);

const ask = async (question: string): Promise<string> => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
};

export const main = async (argv: string[] = process.argv): Promise<void> => {
    const program = buildProgram().parse(argv);
    const options = program.opts<CliOptions>();

    const symbol = (options.symbol ?? (await ask('Enter the Symbol [NIFTY]: '))).trim().toUpperCase() || 'NIFTY';
    const expiryInput = options.expiry ?? (await ask('Enter the Expiry (DD-MMM-YYYY): '));
    const expiry = normalizeExpiry(expiryInput);
    if (!expiry) {
        throw new ConfigError(`"${expiryInput}" is not a valid expiry, use DD-MMM-YYYY (e.g. 28-Oct-2026)`);
    }

    const settings = loadFetcherSettings({ userFile: options.config, type: options.type });
    const fetcher = createNseClient(settings, { timeoutMs: options.timeout, verifyTls: options.verify });
    if (!options.verify) logger.warn('[NSE] TLS certificate verification is disabled');

    const sinks: Sink[] = [];
    if (options.workbook) {
        const workbook = new WorkbookSink(path.join(options.outDir, workbookFileName(symbol, expiry)), options.template);
        sinks.push(workbook);
        logger.info(`Output File Path: ${workbook.file}`);
    }
    if (options.json) {
        sinks.push(new JsonSnapshotSink(path.join(options.outDir, today())));
    }

    let feed: LiveFeed | undefined;
    if (options.serve !== undefined) {
        feed = createLiveFeed(options.serve === true ? config.PORT : options.serve);
        await feed.listen();
        sinks.push(feed.sink);
    }

    const controller = new AbortController();
    const stop = () => {
        logger.info('[POLL] Stopping after the current step...');
        controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    logger.info(`Starting option chain collection for ${symbol} (${expiry}) from ${fetcher.buildUrl(symbol)}`);

    try {
        await runPoller({
            fetcher,
            symbol,
            expiry,
            nstrikes: options.nstrikes,
            multiple: options.multiple ?? strikeMultiple(symbol),
            sinks,
            intervalSeconds: options.interval,
            maxAttempts: options.maxAttempts,
            retryDelaySeconds: options.retryDelay,
            signal: controller.signal,
        });
    } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
        await feed?.close();
    }
};

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.fatal({ err: error }, error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
}
