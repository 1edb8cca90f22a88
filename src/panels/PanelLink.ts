import { setTimeout as delay } from 'node:timers/promises';
import { type AircraftState, aircraftStatesEqual } from '@aircraft/AircraftState';
import { BridgeEvent, type BridgeEventBus } from '@core/events/BridgeEvents';
import type { PanelEndpoints } from '@core/router/EventRouter';
import type { LineTransport, TransportFactory } from '@serial/LineTransport';
import { createLogger, type Logger } from '@utils/Logger';
import { DisconnectError, SerialOpenError, toPanelError, WrongDeviceError } from './PanelErrors';
import type { PanelProfile } from './PanelProfiles';
import { ControlToken, decodeCommand } from './PanelProtocol';

export type PanelLinkState = 'disconnected' | 'opening' | 'handshaking' | 'connected';

export interface PanelTiming {
    /** Upper bound for one serial read; keeps the loop responsive. */
    readTimeoutMs: number;
    /** Time the board needs to reboot after DTR is raised. */
    resetDelayMs: number;
    keepaliveIntervalMs: number;
    bannerTimeoutMs: number;
}

export const DEFAULT_PANEL_TIMING: Readonly<PanelTiming> = {
    readTimeoutMs: 10,
    resetDelayMs: 2000,
    keepaliveIntervalMs: 500,
    bannerTimeoutMs: 5000,
};

export interface PanelLinkConfig extends Partial<PanelTiming> {
    name: string;
    path: string;
    profile: PanelProfile;
}

export interface PanelLinkDependencies {
    transports: TransportFactory;
    events?: BridgeEventBus;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Drives one physical panel: open, handshake, then exchange state and
 * command lines until the device goes away. Never retries; `run()` only
 * settles by rejecting with a `PanelError`.
 */
export class PanelLink {
    readonly name: string;
    readonly path: string;
    private readonly profile: PanelProfile;
    private readonly timing: PanelTiming;
    private readonly transports: TransportFactory;
    private readonly events?: BridgeEventBus;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly logger: Logger;

    private state: PanelLinkState = 'disconnected';
    private lastSentState: AircraftState | null = null;
    private lastWriteAt = 0;
    private running = false;

    constructor(
        config: PanelLinkConfig,
        private readonly endpoints: PanelEndpoints,
        dependencies: PanelLinkDependencies
    ) {
        this.name = config.name;
        this.path = config.path;
        this.profile = config.profile;
        this.timing = {
            readTimeoutMs: config.readTimeoutMs ?? DEFAULT_PANEL_TIMING.readTimeoutMs,
            resetDelayMs: config.resetDelayMs ?? DEFAULT_PANEL_TIMING.resetDelayMs,
            keepaliveIntervalMs:
                config.keepaliveIntervalMs ?? DEFAULT_PANEL_TIMING.keepaliveIntervalMs,
            bannerTimeoutMs: config.bannerTimeoutMs ?? DEFAULT_PANEL_TIMING.bannerTimeoutMs,
        };
        this.transports = dependencies.transports;
        this.events = dependencies.events;
        this.now = dependencies.now ?? (() => performance.now());
        this.sleep = dependencies.sleep ?? (ms => delay(ms));
        this.logger = createLogger(`PanelLink ${config.name}`);
    }

    get currentState(): PanelLinkState {
        return this.state;
    }

    async run(): Promise<never> {
        if (this.running) {
            throw new Error(`Panel link "${this.name}" is already running`);
        }
        this.running = true;

        try {
            const transport = await this.open();
            try {
                await this.connect(transport);
                return await this.serve(transport);
            } finally {
                await this.closeTransport(transport);
            }
        } catch (error) {
            const panelError = toPanelError(error);
            this.events?.emit(BridgeEvent.PANEL_FAILED, {
                panel: this.name,
                path: this.path,
                error: panelError,
            });
            throw panelError;
        } finally {
            this.endpoints.close();
            this.setState('disconnected');
        }
    }

    private async open(): Promise<LineTransport> {
        this.setState('opening');
        this.logger.debug(`Attempting to connect to panel on serial port ${this.path}`);

        let transport: LineTransport;
        try {
            transport = await this.transports.open({
                path: this.path,
                baudRate: this.profile.baudRate,
                delimiter: this.profile.delimiter,
            });
        } catch (error) {
            throw new SerialOpenError(this.path, error);
        }

        this.lastWriteAt = this.now();
        return transport;
    }

    private async connect(transport: LineTransport): Promise<void> {
        await transport.resetDevice();
        await this.sleep(this.timing.resetDelayMs);

        this.setState('handshaking');
        if (this.profile.handshake.kind === 'syn-ack') {
            await this.synAckHandshake(transport);
        } else {
            await this.expectBanner(transport, this.profile.handshake.banner);
        }

        this.setState('connected');
        this.logger.info(
            `Connection with ${this.profile.displayName} established via ${this.path}`
        );
    }

    private async synAckHandshake(transport: LineTransport): Promise<void> {
        await this.write(transport, ControlToken.SYN);

        for (;;) {
            const line = await transport.readLine(this.timing.readTimeoutMs);
            if (line === null) continue;

            if (line === ControlToken.SYN_ACK) {
                await this.write(transport, ControlToken.ACK);
                return;
            }
            if (line === ControlToken.RST) {
                throw new DisconnectError(this.path);
            }
            this.logger.debug(`Ignoring "${line}" while handshaking`);
        }
    }

    private async expectBanner(transport: LineTransport, banner: string): Promise<void> {
        const startedAt = this.now();

        while (this.now() - startedAt < this.timing.bannerTimeoutMs) {
            const line = await transport.readLine(this.timing.readTimeoutMs);
            if (line === null) continue;

            const received = line.trim();
            if (received === banner) return;
            throw new WrongDeviceError(this.path, banner, received);
        }

        throw new WrongDeviceError(this.path, banner, null);
    }

    private async serve(transport: LineTransport): Promise<never> {
        for (;;) {
            await this.pushState(transport);

            const line = await transport.readLine(this.timing.readTimeoutMs);
            if (line !== null) {
                await this.handleLine(transport, line);
            }

            if (
                this.profile.keepalive &&
                this.now() - this.lastWriteAt >= this.timing.keepaliveIntervalMs
            ) {
                await this.write(transport, ControlToken.PING);
            }
        }
    }

    /**
     * Drains every queued state, in order. The whole state is written whenever
     * any field differs from what the panel last received.
     */
    private async pushState(transport: LineTransport): Promise<void> {
        for (;;) {
            const received = this.endpoints.states.tryReceive();
            if (received.status !== 'message') return;

            const state = received.value;
            if (this.lastSentState !== null && aircraftStatesEqual(this.lastSentState, state)) {
                continue;
            }

            for (const line of this.profile.encodeState(state)) {
                await this.write(transport, line);
            }
            this.lastSentState = state;
        }
    }

    private async handleLine(transport: LineTransport, line: string): Promise<void> {
        switch (line) {
            case ControlToken.RST:
                throw new DisconnectError(this.path);
            case ControlToken.PING:
                await this.write(transport, ControlToken.PONG);
                return;
            case ControlToken.PONG:
                return;
            case ControlToken.SYN_ACK:
                // Panel rebooted and started a new handshake.
                await this.write(transport, ControlToken.ACK);
                this.logger.info(`Connection with ${this.profile.displayName} re-established`);
                return;
        }

        if (!this.profile.acceptsCommands) {
            this.logger.debug(`Ignoring "${line}"`);
            return;
        }

        const command = decodeCommand(line);
        if (command === null) {
            this.logger.debug(`Ignoring unknown token "${line}"`);
            return;
        }

        this.logger.debug(`Serial port received command: ${line}`);
        const result = this.endpoints.commands.send(command);
        if (result.status === 'disconnected') {
            this.logger.warn(`Simulation link is gone, dropping ${command}`);
            return;
        }
        this.events?.emit(BridgeEvent.PANEL_COMMAND, { panel: this.name, token: line, command });
    }

    private async write(transport: LineTransport, line: string): Promise<void> {
        await transport.writeLine(line);
        this.lastWriteAt = this.now();
    }

    private async closeTransport(transport: LineTransport): Promise<void> {
        try {
            await transport.close();
        } catch (error) {
            this.logger.warn(`Failed to close serial port ${this.path}:`, error);
        }
    }

    private setState(next: PanelLinkState): void {
        const previous = this.state;
        if (previous === next) return;

        this.state = next;
        this.events?.emit(BridgeEvent.PANEL_STATE_CHANGE, {
            panel: this.name,
            path: this.path,
            previous,
            current: next,
        });
    }
}
