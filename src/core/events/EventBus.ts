import { createLogger } from '@utils/Logger';

export type EventHandler<T> = (data: T) => void;
export type UnsubscribeFn = () => void;

interface EventSubscription<T> {
    handler: EventHandler<T>;
    once: boolean;
    priority: number;
}

type SubscriptionTable<TEvents> = {
    [K in keyof TEvents]?: Array<EventSubscription<TEvents[K]>>;
};

const logger = createLogger('EventBus');

/**
 * Typed publish/subscribe bus. `TEvents` maps each event name to its payload.
 * Higher priority listeners run first; a throwing handler is logged and does
 * not stop the others.
 */
export class EventBus<TEvents extends object> {
    private events: SubscriptionTable<TEvents> = {};
    private eventQueue: Array<() => void> = [];
    private isProcessing = false;

    on<K extends keyof TEvents>(
        event: K,
        handler: EventHandler<TEvents[K]>,
        priority = 0
    ): UnsubscribeFn {
        return this.addListener(event, handler, false, priority);
    }

    once<K extends keyof TEvents>(
        event: K,
        handler: EventHandler<TEvents[K]>,
        priority = 0
    ): UnsubscribeFn {
        return this.addListener(event, handler, true, priority);
    }

    private addListener<K extends keyof TEvents>(
        event: K,
        handler: EventHandler<TEvents[K]>,
        once: boolean,
        priority: number
    ): UnsubscribeFn {
        const subscriptions = this.events[event] ?? [];
        this.events[event] = subscriptions;

        const subscription: EventSubscription<TEvents[K]> = { handler, once, priority };

        const insertIndex = subscriptions.findIndex(sub => sub.priority < priority);
        if (insertIndex === -1) {
            subscriptions.push(subscription);
        } else {
            subscriptions.splice(insertIndex, 0, subscription);
        }

        return () => this.removeListener(event, handler);
    }

    off<K extends keyof TEvents>(event: K, handler?: EventHandler<TEvents[K]>): void {
        if (!handler) {
            delete this.events[event];
        } else {
            this.removeListener(event, handler);
        }
    }

    private removeListener<K extends keyof TEvents>(
        event: K,
        handler: EventHandler<TEvents[K]>
    ): void {
        const subscriptions = this.events[event];
        if (!subscriptions) return;

        const index = subscriptions.findIndex(sub => sub.handler === handler);
        if (index !== -1) {
            subscriptions.splice(index, 1);
            if (subscriptions.length === 0) {
                delete this.events[event];
            }
        }
    }

    /**
     * Queues the event. Events emitted from inside a handler are delivered
     * after the current one has reached every listener.
     */
    emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
        this.eventQueue.push(() => this.emitImmediate(event, data));

        if (!this.isProcessing) {
            this.processQueue();
        }
    }

    emitImmediate<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
        const subscriptions = this.events[event];
        if (!subscriptions) return;

        const toRemove: Array<EventHandler<TEvents[K]>> = [];

        for (const subscription of [...subscriptions]) {
            try {
                subscription.handler(data);
                if (subscription.once) {
                    toRemove.push(subscription.handler);
                }
            } catch (error) {
                logger.error(`Error in event handler for "${String(event)}":`, error);
            }
        }

        for (const handler of toRemove) {
            this.removeListener(event, handler);
        }
    }

    private processQueue(): void {
        this.isProcessing = true;

        let next = this.eventQueue.shift();
        while (next) {
            next();
            next = this.eventQueue.shift();
        }

        this.isProcessing = false;
    }

    clear(): void {
        this.events = {};
        this.eventQueue = [];
    }

    hasListeners<K extends keyof TEvents>(event: K): boolean {
        return (this.events[event]?.length ?? 0) > 0;
    }

    getListenerCount(event?: keyof TEvents): number {
        if (event !== undefined) {
            return this.events[event]?.length ?? 0;
        }

        let count = 0;
        for (const key of Object.keys(this.events)) {
            count += this.countFor(key);
        }
        return count;
    }

    private countFor(key: string): number {
        const entry: unknown = Reflect.get(this.events, key);
        return Array.isArray(entry) ? entry.length : 0;
    }
}
