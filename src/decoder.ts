import {
    quaternionOrientation,
    tiltOrientation,
    type DecodeFailureReason,
    type DecodeResult,
    type Orientation,
    type RawLine,
    type WireFormat,
} from './orientation-types';

/**
 * Line grammars understood on the telemetry link.
 *
 *   w = <float> x = <float> y = <float> z = <float>    quaternion firmware
 *   Ang.x = <int> <whitespace> Ang.y = <int>           legacy tilt firmware
 *
 * Spacing around `=` and between fields is free-form. Trailing whitespace (a
 * stray `\r`) is ignored; any other trailing text rejects the line.
 */
const FLOAT = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?`;
const INT = String.raw`[+-]?\d+`;

const QUATERNION_LINE = new RegExp(
    String.raw`^\s*w\s*=\s*(${FLOAT})\s*x\s*=\s*(${FLOAT})\s*y\s*=\s*(${FLOAT})\s*z\s*=\s*(${FLOAT})\s*$`
);
const TILT_LINE = new RegExp(String.raw`^\s*Ang\.x\s*=\s*(${INT})\s*Ang\.y\s*=\s*(${INT})\s*$`);

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const failures: { readonly [R in DecodeFailureReason]: DecodeResult } = {
    malformed: Object.freeze({ ok: false, reason: 'malformed' }),
    incomplete: Object.freeze({ ok: false, reason: 'incomplete' }),
    'unknown-format': Object.freeze({ ok: false, reason: 'unknown-format' }),
};

function parseQuaternion(line: string): Orientation | null {
    const match = QUATERNION_LINE.exec(line);
    if (!match) return null;
    const values = match.slice(1, 5).map(Number);
    if (!values.every(Number.isFinite)) return null;
    const [w, x, y, z] = values;
    return quaternionOrientation(w, x, y, z);
}

function parseTilt(line: string): Orientation | null {
    const match = TILT_LINE.exec(line);
    if (!match) return null;
    const angleX = Number(match[1]);
    const angleY = Number(match[2]);
    const inRange = (v: number) => v >= INT32_MIN && v <= INT32_MAX;
    if (!inRange(angleX) || !inRange(angleY)) return null;
    return tiltOrientation(angleX, angleY);
}

/**
 * Decodes one telemetry line. In `auto` mode the quaternion grammar is tried
 * first and the tilt grammar second; a fixed format reports lines of the other
 * grammar as `unknown-format`.
 */
export function decodeLine(line: string, format: WireFormat = 'auto'): DecodeResult {
    if (line.trim() === '') return failures.malformed;

    const primary = format === 'tilt' ? parseTilt : parseQuaternion;
    const secondary = format === 'tilt' ? parseQuaternion : parseTilt;

    const orientation = primary(line);
    if (orientation) return { ok: true, orientation };

    const other = secondary(line);
    if (!other) return failures.malformed;
    if (format !== 'auto') return failures['unknown-format'];
    return { ok: true, orientation: other };
}

export function decodeRawLine(raw: RawLine, format: WireFormat = 'auto'): DecodeResult {
    const result = decodeLine(raw.text, format);
    if (!result.ok && raw.truncated) return failures.incomplete;
    return result;
}
