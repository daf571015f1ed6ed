import type { AsyncHandlingController } from './AsyncHandlingController.js';
import type { AsyncRequestHandler, NextStep } from './AsyncRequestHandler.js';
import type { NoExtraData } from './ExtraDataFactory.js';
import type { RequestHandle } from './RequestHandle.js';

export interface HandlerSequence<D = NoExtraData> {
    /**
     * Returns the handler at specified position, or `undefined` past the end.
     */
    handlerAt(index: number): AsyncRequestHandler<D> | undefined;
}

/**
 * Read-only snapshot of a handler list, safe to share between requests.
 */
export class ArrayHandlerSequence<D = NoExtraData> implements HandlerSequence<D> {

    protected handlers: readonly AsyncRequestHandler<D>[];

    constructor(handlers: readonly AsyncRequestHandler<D>[]) {
        this.handlers = Object.freeze([...handlers]);
    }

    get size() {
        return this.handlers.length;
    }

    handlerAt(index: number): AsyncRequestHandler<D> | undefined {
        return this.handlers[index];
    }

}

export class SequenceController<D = NoExtraData> implements AsyncHandlingController<D> {

    protected index = 0;

    constructor(
        readonly sequence: HandlerSequence<D>,
        readonly request: RequestHandle<D>,
    ) {}

    requestHandle() {
        return this.request;
    }

    onNext(): NextStep<D> {
        const handler = this.sequence.handlerAt(this.index);
        if (!handler) {
            return { type: 'noMoreHandlers' };
        }
        this.index += 1;
        return { type: 'handler', handler };
    }

}
