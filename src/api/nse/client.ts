import axios from 'axios';
import { FetcherSettings } from '../../config/source';
import { NetworkError, ParseError } from '../../utils/errors';
import { HttpGetter } from '../../utils/http';
import { ChainPayload, chainPayloadSchema } from './types';

/** A decoded response: the validated envelope and the document exactly as received. */
export type ChainResponse = {
    payload: ChainPayload;
    raw: unknown;
};

/**
 * Validate a response body as an option chain envelope. The body may be the raw
 * text or an already decoded object.
 */
export const parseChainResponse = (body: unknown): ChainResponse => {
    let document: unknown = body;
    if (typeof body === 'string') {
        try {
            document = JSON.parse(body);
        } catch (error) {
            throw new ParseError(`Response is not JSON: ${body.slice(0, 80)}`, { cause: error });
        }
    }

    const result = chainPayloadSchema.safeParse(document);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? issue.path.join('.') || '(root)' : '(root)';
        throw new ParseError(`Unexpected option chain response at ${where}: ${issue?.message ?? 'invalid'}`);
    }
    return { payload: result.data, raw: document };
};

const toNetworkError = (error: unknown, url: string): NetworkError => {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) {
            return new NetworkError(`NSE responded ${status} for ${url}`, status, { cause: error });
        }
        return new NetworkError(`Request to ${url} failed: ${error.code ?? error.message}`, undefined, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new NetworkError(`Request to ${url} failed: ${reason}`, undefined, { cause: error });
};

class NseClient {
    private readonly settings: FetcherSettings;
    private readonly http: HttpGetter;

    constructor(settings: FetcherSettings, http: HttpGetter) {
        this.settings = settings;
        this.http = http;
    }

    /**
     * Option chain URL for a symbol. An `apiuri` override replaces the whole
     * URL; otherwise the base is joined with the index or stock path.
     */
    public buildUrl(symbol: string): string {
        const encoded = encodeURIComponent(symbol.trim().toUpperCase());
        if (this.settings.apiUri) {
            return this.settings.apiUri.replace('{symbol}', encoded);
        }
        const pathTemplate = this.settings.pathByType[this.settings.type];
        return `${this.settings.baseUrl}${pathTemplate.replace('{symbol}', encoded)}`;
    }

    /**
     * One GET of the option chain. Fails with NetworkError for transport and
     * HTTP status problems, ParseError when the body is not a chain envelope.
     */
    public async fetchOptionChain(symbol: string): Promise<ChainResponse> {
        const url = this.buildUrl(symbol);

        let body: unknown;
        try {
            const response = await this.http.get<unknown>(url);
            body = response.data;
        } catch (error) {
            throw toNetworkError(error, url);
        }

        return parseChainResponse(body);
    }
}

export type OptionChainFetcher = Pick<NseClient, 'fetchOptionChain'>;

export default NseClient;
