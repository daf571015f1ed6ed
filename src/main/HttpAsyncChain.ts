import { Logger, type StructuredLogHttpRequest } from '@nodescript/logger';
import { config } from 'mesh-config';
import { dep } from 'mesh-ioc';

import type { AsyncRequestHandler } from './AsyncRequestHandler.js';
import { dispatch } from './dispatch.js';
import type { ExtraDataFactory, NoExtraData } from './ExtraDataFactory.js';
import { makeInternalServerErrorResponse, makeTimeoutResponse } from './fallback.js';
import { ArrayHandlerSequence } from './HandlerSequence.js';
import type { HttpContext } from './HttpContext.js';
import type { HttpHandler } from './HttpHandler.js';
import { HttpRequestHandle } from './HttpRequestHandle.js';
import { ok } from './ScheduleResult.js';
import type { UniqueController } from './UniqueController.js';

/**
 * Offers each request to `handlers` in turn, until one of them claims it.
 *
 * Handlers may respond asynchronously; `handle` resolves once the request
 * has its terminal response, either from a handler or from the chain itself
 * (404 when nobody claims it, 500 when a handler fails to schedule,
 * 503 when the response timeout elapses).
 */
export abstract class HttpAsyncChain<D = NoExtraData> implements HttpHandler {

    @config({ default: 0 }) HTTP_CHAIN_RESPONSE_TIMEOUT!: number;

    @dep({ key: 'Logger' }) logger!: Logger;

    abstract handlers: AsyncRequestHandler<D>[];
    abstract extraDataFactory: ExtraDataFactory<D>;

    protected sequence: ArrayHandlerSequence<D> | null = null;

    async handle(ctx: HttpContext): Promise<void> {
        const req = new HttpRequestHandle(ctx, this.extraDataFactory.createExtraData(), this.logger);
        try {
            dispatch(this.getSequence(), req);
            await this.waitForResponse(req);
        } finally {
            if (ctx.log) {
                this.log(ctx);
            }
        }
    }

    /**
     * Milliseconds to wait for a claimed request to be answered, 0 to wait indefinitely.
     */
    getResponseTimeout() {
        const timeout = this.HTTP_CHAIN_RESPONSE_TIMEOUT;
        return timeout > 0 ? timeout : 0;
    }

    /**
     * Creates a handler out of an async function.
     *
     * The handler returns `Ok` as soon as `fn` starts. If `fn` rejects before the request
     * is answered or passed on, a 500 response is sent; later rejections are only logged.
     */
    deferred(fn: (controller: UniqueController<D>) => Promise<void>): AsyncRequestHandler<D> {
        return controller => {
            const req = controller.requestHandle();
            const owned = controller.release();
            fn(owned).catch(error => {
                if (req.responded) {
                    this.logger.error('Async handler failed after responding', { error });
                    return;
                }
                if (owned.moved) {
                    this.logger.error('Async handler failed after passing the request on', { error });
                    return;
                }
                makeInternalServerErrorResponse(req, error);
            });
            return ok();
        };
    }

    protected getSequence() {
        if (!this.sequence) {
            this.sequence = new ArrayHandlerSequence(this.handlers);
        }
        return this.sequence;
    }

    protected async waitForResponse(req: HttpRequestHandle<D>) {
        const timeout = this.getResponseTimeout();
        if (timeout === 0) {
            return await req.finished();
        }
        const timer = setTimeout(() => this.onResponseTimeout(req, timeout), timeout);
        try {
            await req.finished();
        } finally {
            clearTimeout(timer);
        }
    }

    protected onResponseTimeout(req: HttpRequestHandle<D>, timeout: number) {
        if (req.responded) {
            return;
        }
        this.logger.error(`${this.constructor.name}: no response after ${timeout}ms`, {
            method: req.ctx.method,
            path: req.ctx.path,
        });
        makeTimeoutResponse(req, timeout);
    }

    protected log(ctx: HttpContext) {
        const isError = ctx.status >= 500;
        const logLevel = isError ? 'error' : 'info';
        const httpRequest: StructuredLogHttpRequest = {
            requestMethod: ctx.method,
            requestUrl: ctx.path,
            status: ctx.status,
            latency: `${(Date.now() - ctx.startedAt) / 1000}s`,
            userAgent: ctx.getRequestHeader('user-agent', ''),
        };
        this.logger[logLevel](isError ? `Http Error` : `Http Request`, {
            httpRequest,
            requestId: ctx.getRequestHeader('x-request-id') || undefined,
            error: ctx.error,
        });
    }

}
