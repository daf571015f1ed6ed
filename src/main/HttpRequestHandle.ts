import { InvalidStateError } from '@nodescript/errors';
import type { Logger } from '@nodescript/logger';

import type { NoExtraData } from './ExtraDataFactory.js';
import type { HttpContext, HttpResponseBody } from './HttpContext.js';
import type { HttpDict } from './HttpDict.js';
import type { RequestHandle, ResponseBuilder } from './RequestHandle.js';

interface HttpResponse {
    status: number;
    headers: HttpDict;
    body: HttpResponseBody;
    error: unknown;
}

/**
 * Request handle backed by HttpContext.
 *
 * The first response written wins; any later `done()` throws,
 * so a request is never answered twice.
 */
export class HttpRequestHandle<D = NoExtraData> implements RequestHandle<D> {

    protected _responded = false;
    protected waiters: Array<() => void> = [];

    constructor(
        readonly ctx: HttpContext,
        readonly extraData: D,
        readonly logger: Logger,
    ) {}

    get responded() {
        return this._responded;
    }

    createResponse(status: number): ResponseBuilder {
        return new HttpResponseBuilder(status, res => this.commit(res));
    }

    /**
     * Resolves when the terminal response has been written to the context.
     */
    finished(): Promise<void> {
        if (this._responded) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.waiters.push(resolve));
    }

    protected commit(res: HttpResponse) {
        if (this._responded) {
            throw new InvalidStateError('Response already sent');
        }
        this._responded = true;
        const { ctx } = this;
        ctx.status = res.status;
        for (const [name, values] of Object.entries(res.headers)) {
            ctx.setResponseHeader(name, values);
        }
        ctx.responseBody = res.body;
        ctx.error = res.error;
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }

}

class HttpResponseBuilder implements ResponseBuilder {

    protected headers: HttpDict = {};
    protected body: HttpResponseBody = undefined;
    protected error: unknown = undefined;

    constructor(
        protected status: number,
        protected send: (res: HttpResponse) => void,
    ) {}

    setHeader(name: string, value: string | string[]) {
        this.headers[name] = Array.isArray(value) ? value : [value];
        return this;
    }

    setBody(body: HttpResponseBody) {
        this.body = body;
        return this;
    }

    setError(error: unknown) {
        this.error = error;
        return this;
    }

    done() {
        this.send({
            status: this.status,
            headers: this.headers,
            body: this.body,
            error: this.error,
        });
    }

}
