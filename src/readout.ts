import type { Pose } from './pose';
import type { RenderSink } from './presentation';

export interface ReadoutOutput {
    write(text: string): unknown;
    isTTY?: boolean;
}

export interface TerminalReadoutOptions {
    // minimum time between two printed status lines
    intervalMs?: number;
    now?: () => number;
}

/**
 * One-line terminal status of the current pose and incoming message rate.
 * On a TTY the line is redrawn in place; otherwise a new line is printed
 * whenever a new sample has been shown since the last print.
 */
export class TerminalReadout implements RenderSink {
    private readonly intervalMs: number;
    private readonly now: () => number;
    private lastPrintAt = Number.NEGATIVE_INFINITY;
    private lastPrintedSequence = -1;
    // (time, sequence) samples over the last second, for the msgs/s figure
    private window: { t: number; sequence: number }[] = [];

    constructor(private readonly output: ReadoutOutput, options: TerminalReadoutOptions = {}) {
        this.intervalMs = options.intervalMs ?? 100;
        this.now = options.now ?? (() => performance.now());
    }

    render(pose: Pose) {
        const t = this.now();
        this.window.push({ t, sequence: pose.sequence });
        while (this.window.length > 1 && this.window[0].t < t - 1000) {
            this.window.shift();
        }

        if (t - this.lastPrintAt < this.intervalMs) return;
        if (!this.output.isTTY && pose.sequence === this.lastPrintedSequence) return;

        this.lastPrintAt = t;
        this.lastPrintedSequence = pose.sequence;
        const line = formatReadout(pose, this.messageRate());
        this.output.write(this.output.isTTY ? `\r${line}\x1b[K` : `${line}\n`);
    }

    messageRate(): number {
        if (this.window.length === 0) return 0;
        const oldest = this.window[0];
        const newest = this.window[this.window.length - 1];
        return newest.sequence - oldest.sequence;
    }

    // Leaves the cursor on a fresh line after an in-place readout
    finish() {
        if (this.output.isTTY && this.lastPrintedSequence !== -1) this.output.write('\n');
    }
}

export function normalize180(deg: number): number {
    const x = (deg + 180) % 360;
    return x < 0 ? x + 360 - 180 : x - 180;
}

function angle(value: number): string {
    return normalize180(value).toFixed(1).padStart(6);
}

export function formatReadout(pose: Pose, messagesPerSecond: number): string {
    const { roll, pitch, yaw } = pose.euler;
    const source = pose.orientation.kind === 'quaternion'
        ? 'quat'
        : `tilt ${pose.orientation.angleX}°/${pose.orientation.angleY}°`;
    const waiting = pose.sequence === 0 ? ' (waiting for data)' : '';
    return `roll ${angle(roll)}°  pitch ${angle(pitch)}°  yaw ${angle(yaw)}°  |  Msgs/s: ${messagesPerSecond}  |  ${source}${waiting}`;
}
