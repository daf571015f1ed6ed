import { ChainExhaustedError, ResponseTimeoutError, SchedulingFailedError } from './errors.js';
import type { RequestHandle } from './RequestHandle.js';

type FallbackError = ChainExhaustedError | SchedulingFailedError | ResponseTimeoutError;

/**
 * Sent when the chain ran out of handlers without any of them claiming the request.
 */
export function makeNotFoundResponse<D>(req: RequestHandle<D>) {
    sendFallback(req, new ChainExhaustedError(), {});
}

/**
 * Sent when a handler could not schedule the processing.
 * The cause is attached for logging and never presented to the client.
 */
export function makeInternalServerErrorResponse<D>(req: RequestHandle<D>, cause?: unknown) {
    const error = new SchedulingFailedError();
    sendFallback(req, error, {}, cause ?? error);
}

export function makeTimeoutResponse<D>(req: RequestHandle<D>, timeout: number) {
    sendFallback(req, new ResponseTimeoutError(), { timeout });
}

function sendFallback<D>(
    req: RequestHandle<D>,
    error: FallbackError,
    details: Record<string, unknown>,
    cause: unknown = error,
) {
    req.createResponse(error.status)
        .setBody({
            name: error.name,
            message: error.message,
            details,
        })
        .setError(cause)
        .done();
}
