/**
 * Produces custom data attached to each request entering the chain.
 *
 * The data type `D` is fixed for a whole chain: request handles, controllers
 * and handlers of that chain are all parameterized with it.
 */
export interface ExtraDataFactory<D = unknown> {
    createExtraData(): D;
}

export type ExtraDataOf<F> = F extends ExtraDataFactory<infer D> ? D : never;

export type NoExtraData = Record<string, never>;

export class NoExtraDataFactory implements ExtraDataFactory<NoExtraData> {

    createExtraData(): NoExtraData {
        return {};
    }

}
