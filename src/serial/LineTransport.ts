/**
 * Line-oriented byte stream to one panel. Owned by exactly one panel link.
 */
export interface LineTransport {
    readonly path: string;

    /** Next complete line without its delimiter, or `null` if none arrived in time. */
    readLine(timeoutMs: number): Promise<string | null>;
    /** Writes the line followed by a newline. */
    writeLine(line: string): Promise<void>;
    /** Raises DTR and discards buffered data; most boards reboot on this. */
    resetDevice(): Promise<void>;
    close(): Promise<void>;
}

export interface TransportOptions {
    path: string;
    baudRate: number;
    delimiter: string;
}

export interface TransportFactory {
    open(options: TransportOptions): Promise<LineTransport>;
}
