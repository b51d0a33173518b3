import {
    IDENTITY_ORIENTATION,
    quaternionOrientation,
    tiltOrientation,
    type Orientation,
    type OrientationSnapshot,
} from './orientation-types';

// Layout of the shared buffer:
//   Int32[0]   sequence (odd while a write is in progress)
//   Int32[1]   kind tag
//   Float64[1..4] payload: w,x,y,z or angleX,angleY
const SEQUENCE = 0;
const KIND = 1;
const PAYLOAD_OFFSET = 2 * Int32Array.BYTES_PER_ELEMENT;
const PAYLOAD_FIELDS = 4;

export const ORIENTATION_CELL_BYTES = PAYLOAD_OFFSET + PAYLOAD_FIELDS * Float64Array.BYTES_PER_ELEMENT;

const KIND_NONE = 0;
const KIND_QUATERNION = 1;
const KIND_TILT = 2;

// Reader gives up after this many collisions with an in-flight write and
// keeps serving its previous snapshot
const READ_ATTEMPTS = 8;

export interface OrientationWriter {
    publish(value: Orientation): void;
}

export interface OrientationReader {
    read(): OrientationSnapshot;
}

/**
 * Single-slot latest-value cell shared between the ingestion thread (sole
 * writer) and the presentation thread (sole reader). Backed by a
 * SharedArrayBuffer and guarded by a sequence lock: the writer never waits
 * for the reader, and the reader never returns fields from two different
 * publications.
 */
export class OrientationCell implements OrientationWriter, OrientationReader {
    private readonly control: Int32Array;
    private readonly payload: Float64Array;
    private lastSequenceWord = 0;
    private lastSnapshot: OrientationSnapshot = Object.freeze({ orientation: IDENTITY_ORIENTATION, sequence: 0 });

    private constructor(readonly buffer: SharedArrayBuffer) {
        this.control = new Int32Array(buffer, 0, 2);
        this.payload = new Float64Array(buffer, PAYLOAD_OFFSET, PAYLOAD_FIELDS);
    }

    static create(): OrientationCell {
        return new OrientationCell(new SharedArrayBuffer(ORIENTATION_CELL_BYTES));
    }

    // Wraps a buffer allocated on another thread
    static attach(buffer: SharedArrayBuffer): OrientationCell {
        if (buffer.byteLength !== ORIENTATION_CELL_BYTES) {
            throw new RangeError(`Orientation cell buffer must be ${ORIENTATION_CELL_BYTES} bytes, got ${buffer.byteLength}`);
        }
        return new OrientationCell(buffer);
    }

    get sequence(): number {
        return Atomics.load(this.control, SEQUENCE) >>> 1;
    }

    publish(value: Orientation): void {
        const fields = value.kind === 'quaternion'
            ? [value.w, value.x, value.y, value.z]
            : [value.angleX, value.angleY, 0, 0];
        if (!fields.every(Number.isFinite)) {
            throw new RangeError(`Refusing to publish non-finite orientation: ${JSON.stringify(value)}`);
        }

        Atomics.add(this.control, SEQUENCE, 1);
        for (let i = 0; i < PAYLOAD_FIELDS; i++) this.payload[i] = fields[i];
        Atomics.store(this.control, KIND, value.kind === 'quaternion' ? KIND_QUATERNION : KIND_TILT);
        Atomics.add(this.control, SEQUENCE, 1);
    }

    read(): OrientationSnapshot {
        for (let attempt = 0; attempt < READ_ATTEMPTS; attempt++) {
            const before = Atomics.load(this.control, SEQUENCE);
            if (before & 1) continue;
            if (before === this.lastSequenceWord) return this.lastSnapshot;

            const kind = Atomics.load(this.control, KIND);
            const a = this.payload[0];
            const b = this.payload[1];
            const c = this.payload[2];
            const d = this.payload[3];

            if (Atomics.load(this.control, SEQUENCE) !== before) continue;

            this.lastSequenceWord = before;
            this.lastSnapshot = Object.freeze({
                orientation: materialize(kind, a, b, c, d),
                sequence: before >>> 1,
            });
            return this.lastSnapshot;
        }
        return this.lastSnapshot;
    }

    snapshot(): Orientation {
        return this.read().orientation;
    }
}

function materialize(kind: number, a: number, b: number, c: number, d: number): Orientation {
    switch (kind) {
        case KIND_QUATERNION:
            return quaternionOrientation(a, b, c, d);
        case KIND_TILT:
            return tiltOrientation(a, b);
        case KIND_NONE:
            return IDENTITY_ORIENTATION;
        default:
            throw new Error(`Corrupt orientation cell: unknown kind tag ${kind}`);
    }
}
