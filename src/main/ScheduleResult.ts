/**
 * Outcome of a handler's attempt to schedule the processing of a request.
 *
 * `Ok` means the handler took over the request: it will respond itself,
 * or continue the chain later. `Failure` means the processing could not even begin,
 * and the chain responds with 500 on the handler's behalf.
 */
export enum ScheduleResult {
    Ok = 'ok',
    Failure = 'failure',
}

export function ok() {
    return ScheduleResult.Ok;
}

export function failure() {
    return ScheduleResult.Failure;
}
