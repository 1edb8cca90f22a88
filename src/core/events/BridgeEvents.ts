import type { PanelCommand } from '@aircraft/PanelCommand';
import type { PanelLinkState } from '@panels/PanelLink';
import type { PanelError } from '@panels/PanelErrors';
import type { SimulationLinkState } from '@sim/SimulationLink';
import { EventBus } from './EventBus';

export enum BridgeEvent {
    PANEL_STATE_CHANGE = 'panel:state_change',
    PANEL_FAILED = 'panel:failed',
    PANEL_DROPPED = 'panel:dropped',
    PANEL_COMMAND = 'panel:command',

    SIM_STATE_CHANGE = 'sim:state_change',
    SIM_REGISTERED = 'sim:registered',
    SIM_QUIT = 'sim:quit',
    SIM_ERROR = 'sim:error',
}

export interface PanelStateChangeEvent {
    panel: string;
    path: string;
    previous: PanelLinkState;
    current: PanelLinkState;
}

export interface PanelFailedEvent {
    panel: string;
    path: string;
    error: PanelError;
}

export interface PanelDroppedEvent {
    panel: string;
}

export interface PanelCommandEvent {
    panel: string;
    token: string;
    command: PanelCommand;
}

export interface SimStateChangeEvent {
    previous: SimulationLinkState;
    current: SimulationLinkState;
}

export interface SimErrorEvent {
    phase: 'connect' | 'session';
    error: unknown;
}

export type BridgeEventMap = {
    [BridgeEvent.PANEL_STATE_CHANGE]: PanelStateChangeEvent;
    [BridgeEvent.PANEL_FAILED]: PanelFailedEvent;
    [BridgeEvent.PANEL_DROPPED]: PanelDroppedEvent;
    [BridgeEvent.PANEL_COMMAND]: PanelCommandEvent;
    [BridgeEvent.SIM_STATE_CHANGE]: SimStateChangeEvent;
    [BridgeEvent.SIM_REGISTERED]: { commandCount: number };
    [BridgeEvent.SIM_QUIT]: { sessionNumber: number };
    [BridgeEvent.SIM_ERROR]: SimErrorEvent;
};

export type BridgeEventBus = EventBus<BridgeEventMap>;

export function createBridgeEventBus(): BridgeEventBus {
    return new EventBus<BridgeEventMap>();
}
