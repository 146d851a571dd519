import type { DeliveryFailedError, SessionClosedError } from '../errors';

export type DeliveryStatus = 'pending' | 'delivered' | 'failed';

export type DeliveryOutcome =
    | { status: 'delivered'; ids: readonly number[] }
    | { status: 'failed'; ids: readonly number[]; error: DeliveryFailedError | SessionClosedError };

/**
 * Returned by `submit()`. Tracks every packet one submission was split into
 * and settles exactly once: delivered when the last of them is acked, failed
 * as soon as one exhausts its retries or the session closes first.
 *
 * `result` never rejects; failures are part of the outcome.
 */
export class DeliveryHandle {
    public readonly result: Promise<DeliveryOutcome>;
    private status_: DeliveryStatus = 'pending';
    private outstanding: Set<number>;
    private readonly resolve: (outcome: DeliveryOutcome) => void;

    constructor(public readonly ids: readonly number[]) {
        this.outstanding = new Set(ids);
        let settle: (outcome: DeliveryOutcome) => void = () => undefined;
        this.result = new Promise(resolve => {
            settle = resolve;
        });
        this.resolve = settle;
    }

    public get status(): DeliveryStatus {
        return this.status_;
    }

    public get isSettled(): boolean {
        return this.status_ !== 'pending';
    }

    /** @internal */
    public markAcked(id: number): boolean {
        if (this.isSettled || !this.outstanding.delete(id)) return false;
        if (this.outstanding.size === 0) {
            this.status_ = 'delivered';
            this.resolve({ status: 'delivered', ids: this.ids });
        }
        return true;
    }

    /** @internal */
    public fail(error: DeliveryFailedError | SessionClosedError): boolean {
        if (this.isSettled) return false;
        this.status_ = 'failed';
        this.resolve({ status: 'failed', ids: this.ids, error });
        return true;
    }

    /** Ids not yet acknowledged. */
    public pendingIds(): number[] {
        return Array.from(this.outstanding);
    }
}
