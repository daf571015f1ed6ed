import type { AsyncRequestHandler } from './AsyncRequestHandler.js';
import { makeInternalServerErrorResponse, makeNotFoundResponse } from './fallback.js';
import { type HandlerSequence, SequenceController } from './HandlerSequence.js';
import type { RequestHandle } from './RequestHandle.js';
import { ScheduleResult } from './ScheduleResult.js';
import { UniqueController } from './UniqueController.js';

/**
 * Starts processing a new request with specified handler sequence.
 */
export function dispatch<D>(sequence: HandlerSequence<D>, request: RequestHandle<D>) {
    next(new UniqueController(new SequenceController(sequence, request)));
}

/**
 * Advances the request to the next handler.
 *
 * Takes ownership of the controller: the caller's binding is unusable afterwards.
 * Ends in exactly one of: a handler claims the request, a 500 response is sent
 * because the handler failed to schedule, or a 404 response is sent because
 * no handlers are left.
 */
export function next<D>(controller: UniqueController<D>): void {
    const owned = controller.release();
    const req = owned.requestHandle();
    if (req.responded) {
        req.logger.error('Request already answered, chain continuation ignored');
        return;
    }
    const step = owned.onNext();
    switch (step.type) {
        case 'handler':
            return invokeHandler(step.handler, owned);
        case 'noMoreHandlers':
            return makeNotFoundResponse(req);
    }
}

function invokeHandler<D>(handler: AsyncRequestHandler<D>, controller: UniqueController<D>) {
    // The handler may keep the controller, so the request is captured beforehand
    const req = controller.requestHandle();
    const owned = controller.release();
    let result: ScheduleResult;
    try {
        result = handler(owned);
    } catch (error) {
        // Once answered or passed on, the request is no longer ours to fail
        if (req.responded || owned.moved) {
            throw error;
        }
        return makeInternalServerErrorResponse(req, error);
    }
    if (result === ScheduleResult.Failure) {
        makeInternalServerErrorResponse(req);
    }
}
