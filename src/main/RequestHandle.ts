import type { Logger } from '@nodescript/logger';

import type { NoExtraData } from './ExtraDataFactory.js';
import type { HttpResponseBody } from './HttpContext.js';

export interface ResponseBuilder {
    setHeader(name: string, value: string | string[]): this;
    setBody(body: HttpResponseBody): this;
    /**
     * Attaches the error that caused this response, for logging only.
     */
    setError(error: unknown): this;
    /**
     * Sends the response. A request can only be answered once.
     */
    done(): void;
}

/**
 * The chain's view of an in-flight request.
 *
 * Owned by the transport for the request's whole lifetime; the chain
 * only uses it to produce the terminal response.
 */
export interface RequestHandle<D = NoExtraData> {
    readonly extraData: D;
    readonly responded: boolean;
    /**
     * Receives chain events that have no response left to carry them.
     */
    readonly logger: Logger;
    createResponse(status: number): ResponseBuilder;
}
