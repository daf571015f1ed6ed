import { InvalidStateError } from '@nodescript/errors';

import type { AsyncHandlingController } from './AsyncHandlingController.js';
import type { NextStep } from './AsyncRequestHandler.js';
import type { NoExtraData } from './ExtraDataFactory.js';
import type { RequestHandle } from './RequestHandle.js';

/**
 * Exclusive right to decide what happens next to a request.
 *
 * Ownership moves with `release()`: the returned binding becomes the only usable one,
 * and every call on the released binding throws.
 */
export class UniqueController<D = NoExtraData> {

    protected controller: AsyncHandlingController<D> | null;

    constructor(controller: AsyncHandlingController<D>) {
        this.controller = controller;
    }

    get moved() {
        return this.controller == null;
    }

    requestHandle(): RequestHandle<D> {
        return this.owned().requestHandle();
    }

    onNext(): NextStep<D> {
        return this.owned().onNext();
    }

    release(): UniqueController<D> {
        const controller = this.owned();
        this.controller = null;
        return new UniqueController(controller);
    }

    protected owned() {
        if (!this.controller) {
            throw new InvalidStateError('Controller ownership has been transferred');
        }
        return this.controller;
    }

}
