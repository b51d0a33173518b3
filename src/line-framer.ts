import type { RawLine } from './orientation-types';

export const MAX_LINE_BYTES = 1024;

const LF = 0x0a;
const CR = 0x0d;

/**
 * Splits a byte stream into lines terminated by `\n`, `\r` or `\r\n` (the
 * pair counts once, even when split across chunks). A line longer than the
 * byte cap is cut at the cap and everything after it, up to the next
 * terminator, is discarded; the emitted line is flagged as truncated.
 */
export class LineFramer {
    private parts: Buffer[] = [];
    private length = 0;
    private truncated = false;
    // last chunk ended on a CR; a leading LF in the next one belongs to it
    private afterCarriageReturn = false;

    constructor(private readonly maxLineBytes: number = MAX_LINE_BYTES) {
        if (!Number.isInteger(maxLineBytes) || maxLineBytes <= 0) {
            throw new RangeError(`maxLineBytes must be a positive integer, got ${maxLineBytes}`);
        }
    }

    push(chunk: Uint8Array | string): RawLine[] {
        let bytes: Buffer;
        if (typeof chunk === 'string') bytes = Buffer.from(chunk, 'utf8');
        else bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        const lines: RawLine[] = [];
        let start = 0;
        if (this.afterCarriageReturn && bytes.length > 0) {
            if (bytes[0] === LF) start = 1;
            this.afterCarriageReturn = false;
        }
        for (let i = start; i < bytes.length; i++) {
            const byte = bytes[i];
            if (byte !== LF && byte !== CR) continue;
            this.append(bytes.subarray(start, i));
            lines.push(this.take());
            if (byte === CR) {
                if (i + 1 === bytes.length) this.afterCarriageReturn = true;
                else if (bytes[i + 1] === LF) i++;
            }
            start = i + 1;
        }
        this.append(bytes.subarray(start));
        return lines;
    }

    // Emits whatever is buffered without a terminator (stream ended mid-line)
    flush(): RawLine | null {
        if (this.length === 0 && !this.truncated) return null;
        return this.take();
    }

    private append(bytes: Buffer) {
        const room = this.maxLineBytes - this.length;
        if (bytes.length > room) {
            this.truncated = true;
            bytes = bytes.subarray(0, room);
        }
        if (bytes.length > 0) {
            // copy: the caller may reuse its chunk buffer
            this.parts.push(Buffer.from(bytes));
            this.length += bytes.length;
        }
    }

    private take(): RawLine {
        const text = Buffer.concat(this.parts, this.length).toString('utf8');
        const line: RawLine = { text, truncated: this.truncated };
        this.parts = [];
        this.length = 0;
        this.truncated = false;
        return line;
    }
}
