/**
 * Retransmission timeout estimator (RFC 6298 style smoothing).
 *
 *     rttvar ← (1-β)·rttvar + β·|srtt − R|
 *     srtt   ← (1-α)·srtt   + α·R
 *     rto    ← clamp(srtt + max(G, K·rttvar), [minRto, maxRto])
 *
 * Before the first sample `srtt` holds the configured initial timeout,
 * `rttvar` is zero and `currentTimeout()` is the clamped initial timeout.
 * Backoff is per packet and never feeds back into `srtt`/`rttvar`.
 */
export interface RtoParameters {
    initialRto: number;
    minRto: number;
    maxRto: number;
    alpha: number;
    beta: number;
    k: number;
    granularity: number;
}

export const defaultRtoParameters: RtoParameters = {
    initialRto: 1000,
    minRto: 200,
    maxRto: 60000,
    alpha: 0.125,
    beta: 0.25,
    k: 4,
    granularity: 10,
};

export class RtoEstimator {
    private readonly params: RtoParameters;
    private srtt_: number;
    private rttvar_ = 0;
    private rto_: number;
    private samples_ = 0;

    constructor(params: Partial<RtoParameters> = {}) {
        this.params = { ...defaultRtoParameters, ...params };
        this.srtt_ = this.params.initialRto;
        this.rto_ = this.clamp(this.params.initialRto);
    }

    public get srtt(): number { return this.srtt_; }
    public get rttvar(): number { return this.rttvar_; }
    public get sampleCount(): number { return this.samples_; }

    /**
     * Timeout to arm for a packet sent now.
     */
    public currentTimeout(): number {
        return this.rto_;
    }

    /**
     * Feeds one RTT measurement, in ms. Only call this for packets that were
     * transmitted exactly once; an ack for a retransmitted packet cannot be
     * attributed to a specific attempt.
     */
    public onSample(rtt: number): void {
        if (!Number.isFinite(rtt) || rtt < 0) return;

        const { alpha, beta, k, granularity } = this.params;
        this.rttvar_ = (1 - beta) * this.rttvar_ + beta * Math.abs(this.srtt_ - rtt);
        this.srtt_ = (1 - alpha) * this.srtt_ + alpha * rtt;
        this.rto_ = this.clamp(this.srtt_ + Math.max(granularity, k * this.rttvar_));
        this.samples_++;
    }

    /**
     * Doubles a packet's previous per-attempt timeout, capped at `maxRto`.
     */
    public backoff(previous: number): number {
        return this.clamp(previous * 2);
    }

    private clamp(rto: number): number {
        return Math.max(this.params.minRto, Math.min(rto, this.params.maxRto));
    }
}
