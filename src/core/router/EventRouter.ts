import { type AircraftState, cloneAircraftState } from '@aircraft/AircraftState';
import type { PanelCommand } from '@aircraft/PanelCommand';
import { createChannel, type Receiver, type Sender } from '../channels/Channel';

/** The channel ends handed to one panel link. */
export interface PanelEndpoints {
    readonly name: string;
    readonly states: Receiver<AircraftState>;
    readonly commands: Sender<PanelCommand>;
    /** Drops both ends; the simulation side sees the panel as gone. */
    close(): void;
}

/** The channel ends handed to the simulation link. */
export interface SimulationEndpoints {
    readonly fanOut: StateFanOut;
    readonly commands: Receiver<PanelCommand>;
}

interface FanOutTarget {
    name: string;
    sender: Sender<AircraftState>;
}

/**
 * One state sender per live panel. Each panel receives its own copy of every
 * state; a panel whose receiver is gone is removed without affecting the rest.
 */
export class StateFanOut {
    private targets: FanOutTarget[] = [];

    add(name: string, sender: Sender<AircraftState>): void {
        this.targets.push({ name, sender });
    }

    /** Returns the names of panels that were dropped during this broadcast. */
    broadcast(state: AircraftState): string[] {
        const dropped: string[] = [];

        this.targets = this.targets.filter(target => {
            const result = target.sender.send(cloneAircraftState(state));
            if (result.status === 'disconnected') {
                dropped.push(target.name);
                return false;
            }
            return true;
        });

        return dropped;
    }

    prune(): string[] {
        const dropped = this.targets.filter(target => target.sender.isDisconnected);
        this.targets = this.targets.filter(target => !target.sender.isDisconnected);
        return dropped.map(target => target.name);
    }

    get size(): number {
        return this.targets.length;
    }

    get panelNames(): string[] {
        return this.targets.map(target => target.name);
    }
}

/**
 * Wires panel links and the simulation link together. Panels are registered
 * first, then the simulation side takes its endpoints once.
 */
export class EventRouter {
    private readonly fanOut = new StateFanOut();
    private readonly commandSender: Sender<PanelCommand>;
    private readonly commandReceiver: Receiver<PanelCommand>;
    private readonly panelNames = new Set<string>();
    private simulationConnected = false;

    constructor() {
        const [sender, receiver] = createChannel<PanelCommand>();
        this.commandSender = sender;
        this.commandReceiver = receiver;
    }

    registerPanel(name: string): PanelEndpoints {
        if (this.simulationConnected) {
            throw new Error(`Cannot register panel "${name}" after the simulation link connected`);
        }
        if (this.panelNames.has(name)) {
            throw new Error(`Panel "${name}" is already registered`);
        }
        this.panelNames.add(name);

        const [stateSender, states] = createChannel<AircraftState>();
        const commands = this.commandSender.clone();
        this.fanOut.add(name, stateSender);

        return {
            name,
            states,
            commands,
            close: () => {
                states.close();
                commands.close();
            },
        };
    }

    connectSimulation(): SimulationEndpoints {
        if (this.simulationConnected) {
            throw new Error('The simulation link is already connected');
        }
        this.simulationConnected = true;

        // From here on only the panels hold command senders.
        this.commandSender.close();

        return { fanOut: this.fanOut, commands: this.commandReceiver };
    }

    get registeredPanels(): string[] {
        return [...this.panelNames];
    }
}
