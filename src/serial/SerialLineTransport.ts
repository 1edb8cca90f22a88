import { ReadlineParser, SerialPort } from 'serialport';
import { SerialError } from '@panels/PanelErrors';
import type { LineTransport, TransportFactory, TransportOptions } from './LineTransport';

export interface PortOpenOptions {
    path: string;
    baudRate: number;
    autoOpen: false;
}

type ErrorCallback = (error: Error | null) => void;

/** The part of a `serialport` stream the transport relies on. */
export interface SerialDevice {
    readonly isOpen: boolean;
    open(callback: ErrorCallback): void;
    write(
        data: string,
        encoding: BufferEncoding,
        callback: (error: Error | null | undefined) => void
    ): boolean;
    drain(callback: ErrorCallback): void;
    set(options: { dtr?: boolean }, callback: ErrorCallback): void;
    flush(callback: ErrorCallback): void;
    close(callback: ErrorCallback): void;
    pipe<T extends NodeJS.WritableStream>(destination: T): T;
    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'close', listener: () => void): this;
}

export type PortConstructor = (options: PortOpenOptions) => SerialDevice;

const createSerialPort: PortConstructor = options => new SerialPort(options);

/**
 * `LineTransport` over a `serialport` stream. Incoming data is split by the
 * profile delimiter and buffered until read.
 */
export class SerialLineTransport implements LineTransport {
    private readonly lines: string[] = [];
    private waiter: (() => void) | null = null;
    private failure: SerialError | null = null;

    private constructor(
        readonly path: string,
        private readonly port: SerialDevice,
        delimiter: string
    ) {
        const parser = port.pipe(new ReadlineParser({ delimiter, encoding: 'ascii' }));
        parser.on('data', (line: string) => {
            this.lines.push(line.replace(/\r$/, ''));
            this.wake();
        });
        port.on('error', (error: Error) => this.fail(error));
        port.on('close', () => this.fail(new Error(`Serial port ${path} closed`)));
    }

    static async open(
        options: TransportOptions,
        createPort: PortConstructor = createSerialPort
    ): Promise<SerialLineTransport> {
        const port = createPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });
        await new Promise<void>((resolve, reject) => {
            port.open(error => (error ? reject(error) : resolve()));
        });
        return new SerialLineTransport(options.path, port, options.delimiter);
    }

    async readLine(timeoutMs: number): Promise<string | null> {
        if (this.lines.length === 0 && this.failure === null) {
            await this.waitForData(timeoutMs);
        }

        const line = this.lines.shift();
        if (line !== undefined) return line;
        if (this.failure !== null) throw this.failure;
        return null;
    }

    async writeLine(line: string): Promise<void> {
        if (this.failure !== null) throw this.failure;

        await new Promise<void>((resolve, reject) => {
            this.port.write(`${line}\n`, 'ascii', error => {
                if (error) reject(new SerialError(error));
            });
            this.port.drain(error => (error ? reject(new SerialError(error)) : resolve()));
        });
    }

    async resetDevice(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.port.set({ dtr: true }, error => (error ? reject(new SerialError(error)) : resolve()));
        });
        await new Promise<void>((resolve, reject) => {
            this.port.flush(error => (error ? reject(new SerialError(error)) : resolve()));
        });
        this.lines.length = 0;
    }

    async close(): Promise<void> {
        if (!this.port.isOpen) return;

        await new Promise<void>((resolve, reject) => {
            this.port.close(error => (error ? reject(new SerialError(error)) : resolve()));
        });
    }

    private waitForData(timeoutMs: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.waiter = null;
                resolve();
            }, timeoutMs);
            this.waiter = () => {
                clearTimeout(timer);
                this.waiter = null;
                resolve();
            };
        });
    }

    private wake(): void {
        this.waiter?.();
    }

    private fail(error: Error): void {
        if (this.failure === null) {
            this.failure = new SerialError(error);
        }
        this.wake();
    }
}

export const serialTransports: TransportFactory = {
    open: options => SerialLineTransport.open(options),
};
