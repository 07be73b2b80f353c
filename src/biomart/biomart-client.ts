import axios, { AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import { TransportError } from '../errors.js';

export interface HttpResponse {
    status: number;
    data: unknown;
}

export interface HttpGetter {
    get(url: string): Promise<HttpResponse>;
}

export interface BioMartFetcher {
    query(payload: string): Promise<string>;
}

export function createAxiosGetter(timeoutMs: number = config.biomart.timeoutMs): HttpGetter {
    const instance: AxiosInstance = axios.create({
        timeout: timeoutMs,
        responseType: 'text',
        // Status handling is ours: anything but 200 becomes a TransportError
        validateStatus: () => true,
    });

    return {
        get: async (url: string) => {
            const response = await instance.get<string>(url);
            return { status: response.status, data: response.data };
        },
    };
}

export class BioMartClient implements BioMartFetcher {
    private http: HttpGetter;

    constructor(
        private readonly endpoint: string = config.biomart.url,
        http?: HttpGetter
    ) {
        this.http = http ?? createAxiosGetter();
    }

    buildUrl(payload: string): string {
        const params = new URLSearchParams({ query: payload });
        return `${this.endpoint}?${params.toString()}`;
    }

    /**
     * Send one XML query and return the raw TSV body. Not retried.
     */
    async query(payload: string): Promise<string> {
        const url = this.buildUrl(payload);
        const response = await this.http.get(url);

        if (response.status !== 200) {
            throw new TransportError(response.status, url);
        }

        return typeof response.data === 'string' ? response.data : String(response.data ?? '');
    }
}
