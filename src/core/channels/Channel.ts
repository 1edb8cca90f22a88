/**
 * Unbounded FIFO channel between link tasks.
 *
 * A channel has any number of senders (see `Sender.clone`) and one receiver.
 * Dropping the receiver makes every later send report `disconnected`; dropping
 * the last sender makes the receiver report `disconnected` once drained.
 */

export type SendResult<T> = { status: 'sent' } | { status: 'disconnected'; value: T };

export type TryReceiveResult<T> =
    | { status: 'message'; value: T }
    | { status: 'empty' }
    | { status: 'disconnected' };

interface ChannelState<T> {
    queue: T[];
    senders: number;
    receiverClosed: boolean;
}

export class Sender<T> {
    private closed = false;

    constructor(private readonly state: ChannelState<T>) {
        state.senders++;
    }

    send(value: T): SendResult<T> {
        if (this.closed || this.state.receiverClosed) {
            return { status: 'disconnected', value };
        }
        this.state.queue.push(value);
        return { status: 'sent' };
    }

    clone(): Sender<T> {
        if (this.closed) {
            throw new Error('Cannot clone a closed sender');
        }
        return new Sender(this.state);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.state.senders--;
    }

    /** True once the receiving side has been dropped. */
    get isDisconnected(): boolean {
        return this.closed || this.state.receiverClosed;
    }
}

export class Receiver<T> {
    constructor(private readonly state: ChannelState<T>) {}

    tryReceive(): TryReceiveResult<T> {
        if (this.state.receiverClosed) {
            return { status: 'disconnected' };
        }
        if (this.state.queue.length > 0) {
            const value = this.state.queue[0];
            this.state.queue.shift();
            return { status: 'message', value };
        }
        return this.state.senders === 0 ? { status: 'disconnected' } : { status: 'empty' };
    }

    close(): void {
        this.state.receiverClosed = true;
        this.state.queue = [];
    }

    get isDisconnected(): boolean {
        return this.state.receiverClosed || (this.state.senders === 0 && this.state.queue.length === 0);
    }

    /** True once every sender has been dropped, whether or not values are still queued. */
    get sendersGone(): boolean {
        return this.state.senders === 0;
    }

    get pending(): number {
        return this.state.queue.length;
    }
}

export function createChannel<T>(): [Sender<T>, Receiver<T>] {
    const state: ChannelState<T> = {
        queue: [],
        senders: 0,
        receiverClosed: false,
    };
    return [new Sender(state), new Receiver(state)];
}
