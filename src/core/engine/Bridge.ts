import { type PanelError, toPanelError } from '@panels/PanelErrors';
import { PanelLink, type PanelTiming } from '@panels/PanelLink';
import { profileFor, type PanelType } from '@panels/PanelProfiles';
import type { TransportFactory } from '@serial/LineTransport';
import type { SimulationHost } from '@sim/SimulationHost';
import { SimulationLink, type SimulationLinkConfig } from '@sim/SimulationLink';
import { createLogger } from '@utils/Logger';
import { BridgeEvent, type BridgeEventBus, createBridgeEventBus } from '../events/BridgeEvents';
import { EventRouter } from '../router/EventRouter';

export interface BridgePanelConfig extends Partial<PanelTiming> {
    name: string;
    type: PanelType;
    port: string;
}

export interface BridgeOptions {
    panels: BridgePanelConfig[];
    simulator: SimulationLinkConfig;
    transports: TransportFactory;
    host: SimulationHost;
    events?: BridgeEventBus;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface PanelOutcome {
    name: string;
    path: string;
    error: PanelError;
}

export interface BridgeOutcome {
    panels: PanelOutcome[];
}

const logger = createLogger('Bridge');

/**
 * Owns the router and every link. Each link runs as its own task; the
 * bridge only watches how they end.
 */
export class Bridge {
    readonly events: BridgeEventBus;
    private readonly panelLinks: PanelLink[];
    private readonly simulationLink: SimulationLink;
    private running = false;

    constructor(options: BridgeOptions) {
        if (options.panels.length === 0) {
            throw new Error('At least one panel is required');
        }

        this.events = options.events ?? createBridgeEventBus();
        const router = new EventRouter();

        this.panelLinks = options.panels.map(
            panel =>
                new PanelLink(
                    {
                        name: panel.name,
                        path: panel.port,
                        profile: profileFor(panel.type),
                        readTimeoutMs: panel.readTimeoutMs,
                        resetDelayMs: panel.resetDelayMs,
                        keepaliveIntervalMs: panel.keepaliveIntervalMs,
                        bannerTimeoutMs: panel.bannerTimeoutMs,
                    },
                    router.registerPanel(panel.name),
                    {
                        transports: options.transports,
                        events: this.events,
                        now: options.now,
                        sleep: options.sleep,
                    }
                )
        );

        this.simulationLink = new SimulationLink(
            options.simulator,
            options.host,
            router.connectSimulation(),
            { events: this.events, sleep: options.sleep }
        );

        this.setupEventHandlers();
    }

    private setupEventHandlers(): void {
        this.events.on(BridgeEvent.PANEL_STATE_CHANGE, ({ panel, current }) => {
            logger.debug(`Panel "${panel}" is now ${current}`);
        });

        this.events.on(BridgeEvent.PANEL_COMMAND, ({ panel, token, command }) => {
            logger.debug(`Panel "${panel}" sent ${token} (${command})`);
        });

        this.events.on(BridgeEvent.PANEL_DROPPED, ({ panel }) => {
            logger.debug(`Panel "${panel}" dropped from the state fan-out`);
        });

        this.events.on(BridgeEvent.SIM_STATE_CHANGE, ({ current }) => {
            logger.debug(`Simulation link is now ${current}`);
        });

        this.events.on(BridgeEvent.SIM_REGISTERED, ({ commandCount }) => {
            logger.debug(`Simulator accepted ${commandCount} event mappings`);
        });

        this.events.on(BridgeEvent.SIM_QUIT, ({ sessionNumber }) => {
            logger.debug(`Simulator session ${sessionNumber} ended`);
        });
    }

    /** Resolves when every panel link has ended and the simulation link wound down. */
    async run(): Promise<BridgeOutcome> {
        if (this.running) {
            throw new Error('Bridge already running');
        }
        this.running = true;

        logger.info(`Starting bridge with ${this.panelLinks.length} panel(s)`);
        const simulation = this.simulationLink.run();
        const panels = await Promise.all(this.panelLinks.map(link => this.supervise(link)));
        await simulation;

        logger.info('All links stopped');
        return { panels };
    }

    private async supervise(link: PanelLink): Promise<PanelOutcome> {
        try {
            return await link.run();
        } catch (error) {
            const panelError = toPanelError(error);
            logger.error(`Panel "${link.name}" stopped: ${panelError.message}`);
            return { name: link.name, path: link.path, error: panelError };
        }
    }

    get panels(): readonly PanelLink[] {
        return this.panelLinks;
    }

    get simulation(): SimulationLink {
        return this.simulationLink;
    }
}
