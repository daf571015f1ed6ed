import type { HttpContext } from './HttpContext.js';

export interface HttpHandler {
    /**
     * Resolves once `ctx` holds the terminal response.
     */
    handle(ctx: HttpContext): Promise<void>;
}
