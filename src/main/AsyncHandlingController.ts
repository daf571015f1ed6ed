import type { NextStep } from './AsyncRequestHandler.js';
import type { NoExtraData } from './ExtraDataFactory.js';
import type { RequestHandle } from './RequestHandle.js';

/**
 * Per-request cursor over the handler sequence.
 */
export interface AsyncHandlingController<D = NoExtraData> {
    requestHandle(): RequestHandle<D>;
    onNext(): NextStep<D>;
}
