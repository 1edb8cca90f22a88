export type PanelErrorKind = 'serial-open' | 'disconnect' | 'wrong-device' | 'serial' | 'io';

/**
 * Terminal failure of a panel link. The link does not retry; whoever runs it
 * decides what happens next.
 */
export abstract class PanelError extends Error {
    abstract readonly kind: PanelErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class SerialOpenError extends PanelError {
    readonly kind = 'serial-open';

    constructor(
        readonly path: string,
        cause: unknown
    ) {
        super(`Failed to connect with panel on serial port '${path}': ${describeCause(cause)}`, {
            cause,
        });
    }
}

/** The panel sent RST or broke the protocol. */
export class DisconnectError extends PanelError {
    readonly kind = 'disconnect';

    constructor(readonly path: string) {
        super(`The panel on '${path}' disconnected`);
    }
}

export class WrongDeviceError extends PanelError {
    readonly kind = 'wrong-device';

    constructor(
        readonly path: string,
        readonly expected: string,
        readonly received: string | null
    ) {
        super(
            received === null
                ? `No device banner received on '${path}' (expected '${expected}')`
                : `Unexpected device on '${path}': got '${received}', expected '${expected}'`
        );
    }
}

export class SerialError extends PanelError {
    readonly kind = 'serial';

    constructor(cause: unknown) {
        super(`Serial communication error: ${describeCause(cause)}`, { cause });
    }
}

export class IoError extends PanelError {
    readonly kind = 'io';

    constructor(cause: unknown) {
        super(`Panel I/O error: ${describeCause(cause)}`, { cause });
    }
}

export function toPanelError(error: unknown): PanelError {
    return error instanceof PanelError ? error : new IoError(error);
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
