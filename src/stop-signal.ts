const FLAG = 0;

// Cross-thread stop request. Set once by the lifecycle coordinator, polled by
// the ingestion loop between reads.
export class StopSignal {
    private readonly flag: Int32Array;

    private constructor(readonly buffer: SharedArrayBuffer) {
        this.flag = new Int32Array(buffer, 0, 1);
    }

    static create(): StopSignal {
        return new StopSignal(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    }

    static attach(buffer: SharedArrayBuffer): StopSignal {
        if (buffer.byteLength !== Int32Array.BYTES_PER_ELEMENT) {
            throw new RangeError(`Stop signal buffer must be ${Int32Array.BYTES_PER_ELEMENT} bytes, got ${buffer.byteLength}`);
        }
        return new StopSignal(buffer);
    }

    get requested(): boolean {
        return Atomics.load(this.flag, FLAG) !== 0;
    }

    /** Returns true for the call that actually raised the flag. */
    request(): boolean {
        return Atomics.compareExchange(this.flag, FLAG, 0, 1) === 0;
    }
}
