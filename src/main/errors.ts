import { BaseError } from '@nodescript/errors';

export class ChainExhaustedError extends BaseError {
    override status = 404;

    override get defaultMessage() {
        return 'No handler accepted the request';
    }
}

export class SchedulingFailedError extends BaseError {
    override status = 500;

    override get defaultMessage() {
        return 'The request cannot be processed';
    }
}

export class ResponseTimeoutError extends BaseError {
    override status = 503;

    override get defaultMessage() {
        return 'The request was not processed in time';
    }
}
