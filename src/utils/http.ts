import https from 'https';
import axios, { AxiosInstance } from 'axios';

export type HttpClientOptions = {
    headers: Record<string, string>;
    timeoutMs: number;
    /** When false, TLS certificates are not verified (`--no-verify`). */
    verifyTls: boolean;
};

/** The subset of axios the API clients call, so tests can hand in a fake. */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export const createHttpClient = ({ headers, timeoutMs, verifyTls }: HttpClientOptions): AxiosInstance =>
    axios.create({
        headers,
        timeout: timeoutMs,
        httpsAgent: new https.Agent({ rejectUnauthorized: verifyTls }),
        // parsed by the client so a bad body becomes a ParseError, not an axios error
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
    });
