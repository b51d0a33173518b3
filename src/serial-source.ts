import type { Readable } from 'node:stream';
import { SerialPort } from 'serialport';
import { TransportOpenError } from './errors';
import { StreamLineSource } from './line-source';

// Port settings the IMU firmware talks at (8N1, hardware flow control)
export const DEFAULT_BAUD_RATE = 38400;

export interface SerialPortSettings {
    path: string;
    baudRate: number;
    rtscts: boolean;
}

type ErrorCallback = (err: Error | null) => void;

// The slice of serialport's stream API this module relies on
export interface SerialPortLike extends Readable {
    readonly isOpen: boolean;
    open(callback?: ErrorCallback): void;
    flush(callback?: ErrorCallback): void;
    close(callback?: ErrorCallback): void;
}

export type PortFactory = (settings: SerialPortSettings) => SerialPortLike;

export const createSerialPort: PortFactory = (settings) => new SerialPort({
    path: settings.path,
    baudRate: settings.baudRate,
    dataBits: 8,
    stopBits: 1,
    parity: 'none',
    rtscts: settings.rtscts,
    // line settings must survive configureSerialLine closing the port
    hupcl: false,
    autoOpen: false,
});

function openPort(port: SerialPortLike): Promise<void> {
    return new Promise((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
    });
}

function flushPort(port: SerialPortLike): Promise<void> {
    return new Promise((resolve, reject) => {
        port.flush((err) => (err ? reject(err) : resolve()));
    });
}

function closePort(port: SerialPortLike): Promise<void> {
    return new Promise((resolve, reject) => {
        if (!port.isOpen) {
            resolve();
            return;
        }
        port.close((err) => (err ? reject(err) : resolve()));
    });
}

function describeLine(settings: SerialPortSettings): string {
    return `${settings.baudRate} baud 8N1${settings.rtscts ? ' (RTS/CTS)' : ''}`;
}

async function openConfigured(settings: SerialPortSettings, factory: PortFactory): Promise<SerialPortLike> {
    let port: SerialPortLike;
    try {
        port = factory(settings);
        await openPort(port);
    } catch (error) {
        throw new TransportOpenError(settings.path, error);
    }

    try {
        await flushPort(port);
    } catch (error) {
        console.warn(`[serial] Could not flush ${settings.path}:`, error);
    }
    return port;
}

/**
 * Applies the line settings to the device, discards queued input and closes
 * it again. The ingestion worker then reads the device as a plain file; the
 * terminal keeps these settings across the close.
 */
export async function configureSerialLine(
    settings: SerialPortSettings,
    factory: PortFactory = createSerialPort
): Promise<void> {
    const port = await openConfigured(settings, factory);
    try {
        await closePort(port);
    } catch (error) {
        throw new TransportOpenError(settings.path, error);
    }
    console.log(`[serial] Configured ${settings.path} for ${describeLine(settings)}`);
}

/**
 * Opens the serial device and wraps it as a line source read on the calling
 * thread. Input already queued by the driver is discarded so the first frame
 * read is a fresh one.
 */
export async function openSerialLineSource(
    settings: SerialPortSettings,
    factory: PortFactory = createSerialPort
): Promise<StreamLineSource> {
    const port = await openConfigured(settings, factory);
    console.log(`[serial] Opened ${settings.path} at ${describeLine(settings)}`);
    return new StreamLineSource(port, {
        close: async () => {
            await closePort(port);
            console.log(`[serial] Closed ${settings.path}`);
        },
    });
}
