import type { IncomingMessage } from 'node:http';
import type { Stream } from 'node:stream';

import type { HttpDict } from './HttpDict.js';
import { headersToDict, searchParamsToDict } from './util.js';

export type HttpResponseBody = Stream | Buffer | string | object | undefined;

/**
 * The parts of an inbound request the chain needs; `IncomingMessage` satisfies it.
 */
export type HttpRequestInfo = Pick<IncomingMessage, 'method' | 'url' | 'headers'>;

/**
 * A request as seen by the chain, together with the response being prepared for it.
 *
 * Writing the response to the wire is up to the transport,
 * once the handler resolves.
 */
export class HttpContext {

    readonly host: string;
    readonly url: URL;
    readonly query: HttpDict;
    readonly requestHeaders: HttpDict;

    status = 200;
    responseHeaders: HttpDict = {};
    responseBody: HttpResponseBody = undefined;
    error: unknown = undefined;

    startedAt = Date.now();
    log = true;

    constructor(readonly request: HttpRequestInfo) {
        this.requestHeaders = headersToDict(request.headers);
        this.host = this.getRequestHeader('host', 'localhost');
        this.url = new URL(request.url ?? '/', `http://${this.host}`);
        this.query = searchParamsToDict(this.url.searchParams);
    }

    get method() {
        return (this.request.method ?? '').toUpperCase();
    }

    get path() {
        return this.url.pathname;
    }

    getRequestHeader(name: string, fallback = ''): string {
        return this.requestHeaders[name.toLowerCase()]?.[0] ?? fallback;
    }

    setResponseHeader(name: string, value: string | string[]) {
        this.responseHeaders[name] = Array.isArray(value) ? value : [value];
    }

}
