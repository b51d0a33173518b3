import fs from 'node:fs';
import { TransportOpenError } from './errors';
import { StreamLineSource } from './line-source';

function closeStream(stream: fs.ReadStream): Promise<void> {
    return new Promise((resolve) => {
        if (stream.closed) {
            resolve();
            return;
        }
        // a read still in flight finishes before the descriptor is released
        stream.once('close', () => resolve());
        stream.destroy();
    });
}

/**
 * Opens an already-configured character device (or any readable file) and
 * wraps it as a line source. Reads go through libuv's file I/O, so this is
 * what the ingestion worker uses to own the device on its own thread.
 */
export function openDeviceLineSource(path: string): Promise<StreamLineSource> {
    return new Promise((resolve, reject) => {
        const stream = fs.createReadStream(path);
        const onError = (error: Error) => reject(new TransportOpenError(path, error));
        stream.once('error', onError);
        stream.once('open', () => {
            stream.off('error', onError);
            console.log(`[serial] Reading ${path} on the ingestion thread`);
            resolve(new StreamLineSource(stream, {
                close: async () => {
                    await closeStream(stream);
                    console.log(`[serial] Closed ${path}`);
                },
            }));
        });
    });
}
