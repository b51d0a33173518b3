import * as THREE from 'three';
import type { Orientation, OrientationSnapshot } from './orientation-types';

export type SignedAxis = 'x' | '-x' | 'y' | '-y' | 'z' | '-z';

/**
 * Sensor axis feeding each render axis, in render X, Y, Z order. The default
 * maps render X = sensor X, render Y = sensor Z, render Z = -sensor Y, which
 * is a fixed Rx(-90°) between the Z-up sensor frame and three's Y-up world.
 */
export type AxisMapping = readonly [SignedAxis, SignedAxis, SignedAxis];

export const DEFAULT_AXIS_MAPPING: AxisMapping = ['x', 'z', '-y'];

const SIGNED_AXES: readonly SignedAxis[] = ['x', '-x', 'y', '-y', 'z', '-z'];

function isSignedAxis(value: string): value is SignedAxis {
    return (SIGNED_AXES as readonly string[]).includes(value);
}

/** Parses "x,z,-y" style mappings. Rejects repeated axes and mirror images. */
export function parseAxisMapping(text: string): AxisMapping {
    const parts = text.split(',').map((part) => part.trim().toLowerCase());
    if (parts.length !== 3) {
        throw new RangeError(`Axis mapping needs three comma-separated axes, got "${text}"`);
    }
    const [a, b, c] = parts;
    if (!isSignedAxis(a) || !isSignedAxis(b) || !isSignedAxis(c)) {
        throw new RangeError(`Axis mapping entries must be one of ${SIGNED_AXES.join(', ')}, got "${text}"`);
    }
    const mapping: AxisMapping = [a, b, c];
    basisFromAxisMapping(mapping);
    return mapping;
}

function axisRow(axis: SignedAxis): [number, number, number] {
    const sign = axis.startsWith('-') ? -1 : 1;
    switch (axis.replace('-', '')) {
        case 'x': return [sign, 0, 0];
        case 'y': return [0, sign, 0];
        default: return [0, 0, sign];
    }
}

/** Rotation taking sensor-frame vectors into the render frame. */
export function basisFromAxisMapping(mapping: AxisMapping): THREE.Quaternion {
    const [r0, r1, r2] = mapping.map(axisRow);
    const matrix = new THREE.Matrix4().set(
        r0[0], r0[1], r0[2], 0,
        r1[0], r1[1], r1[2], 0,
        r2[0], r2[1], r2[2], 0,
        0, 0, 0, 1
    );
    const det = matrix.determinant();
    if (Math.abs(det - 1) > 1e-9) {
        // det 0: an axis repeats; det -1: a mirror, which no rotation can express
        throw new RangeError(`Axis mapping ${mapping.join(',')} is not a proper rotation (determinant ${det})`);
    }
    return new THREE.Quaternion().setFromRotationMatrix(matrix);
}

export interface EulerDegrees {
    roll: number;
    pitch: number;
    yaw: number;
}

export interface Pose {
    rotation: THREE.Quaternion;
    // render-frame rotation as ZYX Euler angles, degrees
    euler: EulerDegrees;
    orientation: Orientation;
    sequence: number;
    // false when this tick re-renders a sample already shown
    fresh: boolean;
}

const RAD_TO_DEG = 180 / Math.PI;

export class PoseMapper {
    private readonly sensorToRender: THREE.Quaternion;
    private readonly renderToSensor: THREE.Quaternion;

    constructor(mapping: AxisMapping = DEFAULT_AXIS_MAPPING) {
        this.sensorToRender = basisFromAxisMapping(mapping);
        this.renderToSensor = this.sensorToRender.clone().invert();
    }

    /** Sensor-frame rotation carried by the orientation sample. */
    sensorRotation(orientation: Orientation): THREE.Quaternion {
        if (orientation.kind === 'quaternion') {
            // three orders components x, y, z, w
            return new THREE.Quaternion(orientation.x, orientation.y, orientation.z, orientation.w).normalize();
        }
        const euler = new THREE.Euler(
            THREE.MathUtils.degToRad(orientation.angleX),
            THREE.MathUtils.degToRad(orientation.angleY),
            0,
            'XYZ'
        );
        return new THREE.Quaternion().setFromEuler(euler);
    }

    /** Same rotation expressed in the render frame (conjugation by the basis change). */
    renderRotation(orientation: Orientation): THREE.Quaternion {
        return this.sensorToRender.clone()
            .multiply(this.sensorRotation(orientation))
            .multiply(this.renderToSensor);
    }

    toPose(snapshot: OrientationSnapshot, fresh: boolean): Pose {
        const rotation = this.renderRotation(snapshot.orientation);
        const e = new THREE.Euler().setFromQuaternion(rotation, 'ZYX');
        return {
            rotation,
            euler: { roll: e.x * RAD_TO_DEG, pitch: e.y * RAD_TO_DEG, yaw: e.z * RAD_TO_DEG },
            orientation: snapshot.orientation,
            sequence: snapshot.sequence,
            fresh,
        };
    }
}
