import { FetcherSettings } from '../../config/source';
import { createHttpClient } from '../../utils/http';
import NseClient from './client';

export type ClientOptions = {
    timeoutMs: number;
    verifyTls: boolean;
};

export const createNseClient = (settings: FetcherSettings, options: ClientOptions): NseClient =>
    new NseClient(
        settings,
        createHttpClient({ headers: settings.headers, timeoutMs: options.timeoutMs, verifyTls: options.verifyTls }),
    );
