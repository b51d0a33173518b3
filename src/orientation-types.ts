export interface QuaternionOrientation {
    readonly kind: 'quaternion';
    readonly w: number;
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

// Legacy two-axis tilt reading, integer degrees as sent by the firmware
export interface TiltOrientation {
    readonly kind: 'tilt';
    readonly angleX: number;
    readonly angleY: number;
}

export type Orientation = QuaternionOrientation | TiltOrientation;

export type WireFormat = 'auto' | 'quaternion' | 'tilt';

export type DecodeFailureReason = 'malformed' | 'incomplete' | 'unknown-format';

export type DecodeResult =
    | { readonly ok: true; readonly orientation: Orientation }
    | { readonly ok: false; readonly reason: DecodeFailureReason };

export interface RawLine {
    text: string;
    // true when the frame hit the byte cap and its tail was discarded
    truncated: boolean;
}

export interface OrientationSnapshot {
    readonly orientation: Orientation;
    // number of publications seen so far; 0 until the first sample arrives
    readonly sequence: number;
}

export const IDENTITY_ORIENTATION: QuaternionOrientation = Object.freeze({
    kind: 'quaternion',
    w: 1,
    x: 0,
    y: 0,
    z: 0,
});

export function quaternionOrientation(w: number, x: number, y: number, z: number): QuaternionOrientation {
    return Object.freeze({ kind: 'quaternion', w, x, y, z });
}

export function tiltOrientation(angleX: number, angleY: number): TiltOrientation {
    return Object.freeze({ kind: 'tilt', angleX, angleY });
}
