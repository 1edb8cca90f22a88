import { setTimeout as delay } from 'node:timers/promises';
import { type AircraftState, aircraftStateFromTelemetry } from '@aircraft/AircraftState';
import { ALL_PANEL_COMMANDS, hostEventFor } from '@aircraft/PanelCommand';
import { BridgeEvent, type BridgeEventBus } from '@core/events/BridgeEvents';
import type { SimulationEndpoints } from '@core/router/EventRouter';
import { createLogger } from '@utils/Logger';
import type { SimNotification, SimulationConnection, SimulationHost } from './SimulationHost';

export type SimulationLinkState = 'disconnected' | 'connecting' | 'connected';

export const DEFAULT_APP_NAME = 'Panel Bridge';
export const DEFAULT_RECONNECT_DELAY_MS = 5000;
export const DEFAULT_FRAME_INTERVAL_MS = 10;

export interface SimulationLinkConfig {
    appName?: string;
    reconnectDelayMs?: number;
    /** Pause between polls, about one simulator frame. */
    frameIntervalMs?: number;
}

export interface SimulationLinkDependencies {
    events?: BridgeEventBus;
    sleep?: (ms: number) => Promise<void>;
}

type SessionOutcome = 'quit' | 'finished';

const logger = createLogger('SimulationLink');

/**
 * Keeps a connection to the simulation host alive for as long as any panel
 * is. A stopped simulator is normal: the link waits and reconnects, and no
 * error ever leaves `run()`.
 */
export class SimulationLink {
    private readonly appName: string;
    private readonly reconnectDelayMs: number;
    private readonly frameIntervalMs: number;
    private readonly events?: BridgeEventBus;
    private readonly sleep: (ms: number) => Promise<void>;

    private state: SimulationLinkState = 'disconnected';
    private registered = false;
    private sessionCount = 0;

    constructor(
        config: SimulationLinkConfig,
        private readonly host: SimulationHost,
        private readonly endpoints: SimulationEndpoints,
        dependencies: SimulationLinkDependencies = {}
    ) {
        this.appName = config.appName ?? DEFAULT_APP_NAME;
        this.reconnectDelayMs = config.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
        this.frameIntervalMs = config.frameIntervalMs ?? DEFAULT_FRAME_INTERVAL_MS;
        this.events = dependencies.events;
        this.sleep = dependencies.sleep ?? (ms => delay(ms));
    }

    get currentState(): SimulationLinkState {
        return this.state;
    }

    get isRegistered(): boolean {
        return this.registered;
    }

    /** Resolves once every panel is gone. */
    async run(): Promise<void> {
        while (!this.finished()) {
            await this.connectOnce();
            if (this.finished()) break;

            await this.sleep(this.reconnectDelayMs);
        }

        const unsent = this.endpoints.commands.pending;
        if (unsent > 0) {
            logger.warn(`Dropping ${unsent} command(s) that never reached the simulator`);
            this.endpoints.commands.close();
        }
        logger.info('No panels left, stopping');
    }

    private async connectOnce(): Promise<void> {
        this.setState('connecting');
        logger.debug('Attempting to connect to the simulator');

        let connection: SimulationConnection;
        try {
            connection = await this.host.connect(this.appName);
        } catch (error) {
            logger.warn('Failed to connect to the simulator:', describeError(error));
            this.events?.emit(BridgeEvent.SIM_ERROR, { phase: 'connect', error });
            this.setState('disconnected');
            return;
        }

        this.sessionCount++;
        try {
            const outcome = await this.runSession(connection);
            if (outcome === 'quit') {
                logger.info('Disconnected from flight simulator');
            }
        } catch (error) {
            logger.error('Simulator communication error:', describeError(error));
            this.events?.emit(BridgeEvent.SIM_ERROR, { phase: 'session', error });
        } finally {
            this.registered = false;
            this.closeConnection(connection);
            this.setState('disconnected');
        }
    }

    private async runSession(connection: SimulationConnection): Promise<SessionOutcome> {
        for (;;) {
            if (this.finished()) return 'finished';

            if (this.registered) {
                this.forwardCommand(connection);
            }

            const notification = connection.nextNotification();
            if (notification !== null && this.handleNotification(connection, notification) === 'quit') {
                return 'quit';
            }

            await this.sleep(this.frameIntervalMs);
        }
    }

    private forwardCommand(connection: SimulationConnection): void {
        const next = this.endpoints.commands.tryReceive();
        if (next.status !== 'message') return;

        const mapping = hostEventFor(next.value);
        logger.debug(`Transmitting ${next.value} as ${mapping.name}(${mapping.payload})`);
        connection.transmitEvent(next.value, mapping);
    }

    private handleNotification(
        connection: SimulationConnection,
        notification: SimNotification
    ): 'quit' | 'continue' {
        switch (notification.kind) {
            case 'open':
                logger.info(`Connection with flight simulator established (${notification.applicationName})`);
                this.register(connection);
                return 'continue';
            case 'quit':
                this.events?.emit(BridgeEvent.SIM_QUIT, { sessionNumber: this.sessionCount });
                return 'quit';
            case 'data':
                this.broadcast(aircraftStateFromTelemetry(notification.telemetry));
                return 'continue';
            case 'error':
                throw notification.error;
            case 'exception':
                logger.warn(
                    `Simulator rejected request ${notification.sendId} (exception ${notification.code})`
                );
                return 'continue';
            case 'unknown':
                logger.debug(`Ignoring notification: ${notification.description}`);
                return 'continue';
        }
    }

    /** Commands are only forwarded once every mapping exists on the host. */
    private register(connection: SimulationConnection): void {
        connection.subscribeAircraftState();
        for (const command of ALL_PANEL_COMMANDS) {
            connection.mapEvent(command, hostEventFor(command).name);
        }

        this.registered = true;
        this.setState('connected');
        this.events?.emit(BridgeEvent.SIM_REGISTERED, { commandCount: ALL_PANEL_COMMANDS.length });
    }

    private broadcast(state: AircraftState): void {
        logger.debug('Received aircraft state', state);
        for (const panel of this.endpoints.fanOut.broadcast(state)) {
            this.reportDropped(panel);
        }
    }

    private finished(): boolean {
        for (const panel of this.endpoints.fanOut.prune()) {
            this.reportDropped(panel);
        }
        return this.endpoints.fanOut.size === 0 && this.endpoints.commands.sendersGone;
    }

    private reportDropped(panel: string): void {
        logger.warn(`Panel "${panel}" is gone, no longer sending it aircraft state`);
        this.events?.emit(BridgeEvent.PANEL_DROPPED, { panel });
    }

    private closeConnection(connection: SimulationConnection): void {
        try {
            connection.close();
        } catch (error) {
            logger.debug('Error while closing simulator connection:', describeError(error));
        }
    }

    private setState(next: SimulationLinkState): void {
        const previous = this.state;
        if (previous === next) return;

        this.state = next;
        this.events?.emit(BridgeEvent.SIM_STATE_CHANGE, { previous, current: next });
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
