import { type AircraftState, gearStatusCode } from '@aircraft/AircraftState';
import { PanelCommand } from '@aircraft/PanelCommand';

/**
 * Line protocol spoken with the panel firmware. Lines are ASCII and
 * newline terminated unless the panel profile says otherwise.
 */
export const ControlToken = {
    SYN: 'SYN',
    SYN_ACK: 'SYN|ACK',
    ACK: 'ACK',
    RST: 'RST',
    PING: 'PING',
    PONG: 'PONG',
} as const;

export type ControlToken = (typeof ControlToken)[keyof typeof ControlToken];

const COMMAND_TOKENS: ReadonlyMap<string, PanelCommand> = new Map([
    ['MISC1:0', PanelCommand.TaxiLightsOff],
    ['MISC1:1', PanelCommand.TaxiLightsOn],
    ['MISC2:0', PanelCommand.LandingLightsOff],
    ['MISC2:1', PanelCommand.LandingLightsOn],
    ['MISC3:0', PanelCommand.NavLightsOff],
    ['MISC3:1', PanelCommand.NavLightsOn],
    ['MISC4:0', PanelCommand.StrobeLightsOff],
    ['MISC4:1', PanelCommand.StrobeLightsOn],
    ['FLAPS_UP', PanelCommand.FlapsUp],
    ['FLAPS_DN', PanelCommand.FlapsDown],
    ['PARKING_BRAKE:0', PanelCommand.ParkingBrakeOff],
    ['PARKING_BRAKE:1', PanelCommand.ParkingBrakeOn],
    ['LANDING_GEAR:0', PanelCommand.LandingGearUp],
    ['LANDING_GEAR:1', PanelCommand.LandingGearDown],
]);

/** Unknown tokens decode to `null`. */
export function decodeCommand(token: string): PanelCommand | null {
    return COMMAND_TOKENS.get(token) ?? null;
}

export function encodeIndicatorLines(state: AircraftState): string[] {
    return [
        `PARKING_BRAKE:${state.parkingBrake ? 1 : 0}`,
        `FRONT_GEAR_LED:${gearStatusCode(state.gearCenter)}`,
        `LEFT_GEAR_LED:${gearStatusCode(state.gearLeft)}`,
        `RIGHT_GEAR_LED:${gearStatusCode(state.gearRight)}`,
    ];
}

export function encodeAirspeedLine(state: AircraftState): string {
    const knots = Number.isFinite(state.airspeed) ? Math.trunc(state.airspeed) : 0;
    return `Type<I-A>::Target<Airspeed-Indicator>::Content<${knots}>::Origin<Interface>;`;
}
