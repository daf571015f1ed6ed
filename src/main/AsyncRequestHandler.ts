import type { NoExtraData } from './ExtraDataFactory.js';
import type { ScheduleResult } from './ScheduleResult.js';
import type { UniqueController } from './UniqueController.js';

/**
 * A step of the chain.
 *
 * The handler receives ownership of the controller. It either responds to the request,
 * schedules the work elsewhere and keeps the controller to continue with `next` later,
 * or returns `Failure` without touching the request.
 */
export type AsyncRequestHandler<D = NoExtraData> = (controller: UniqueController<D>) => ScheduleResult;

export interface NextHandler<D = NoExtraData> {
    type: 'handler';
    handler: AsyncRequestHandler<D>;
}

export interface NoMoreHandlers {
    type: 'noMoreHandlers';
}

export type NextStep<D = NoExtraData> = NextHandler<D> | NoMoreHandlers;
