import type { AircraftState } from '@aircraft/AircraftState';
import { encodeAirspeedLine, encodeIndicatorLines } from './PanelProtocol';

export type PanelType = 'eventsim' | 'airspeed-indicator';

export const PANEL_TYPES = ['eventsim', 'airspeed-indicator'] as const satisfies readonly PanelType[];

/** With `banner` the device announces itself with a fixed line after reset. */
export type HandshakeStyle = { kind: 'syn-ack' } | { kind: 'banner'; banner: string };

/**
 * What differs between panel hardware: serial settings, how the device
 * introduces itself and what the bridge writes to it.
 */
export interface PanelProfile {
    readonly type: PanelType;
    readonly displayName: string;
    readonly baudRate: number;
    readonly delimiter: string;
    readonly handshake: HandshakeStyle;
    readonly keepalive: boolean;
    readonly acceptsCommands: boolean;
    encodeState(state: AircraftState): string[];
}

export const EVENTSIM_PROFILE: PanelProfile = {
    type: 'eventsim',
    displayName: 'EventSim panel',
    baudRate: 115200,
    delimiter: '\n',
    handshake: { kind: 'syn-ack' },
    keepalive: true,
    acceptsCommands: true,
    encodeState: encodeIndicatorLines,
};

export const AIRSPEED_INDICATOR_PROFILE: PanelProfile = {
    type: 'airspeed-indicator',
    displayName: 'airspeed indicator panel',
    baudRate: 38400,
    delimiter: ';',
    handshake: { kind: 'banner', banner: 'Name<Airspeed-Indicator>' },
    keepalive: false,
    acceptsCommands: false,
    encodeState: state => [encodeAirspeedLine(state)],
};

const PROFILES: Record<PanelType, PanelProfile> = {
    eventsim: EVENTSIM_PROFILE,
    'airspeed-indicator': AIRSPEED_INDICATOR_PROFILE,
};

export function profileFor(type: PanelType): PanelProfile {
    return PROFILES[type];
}
