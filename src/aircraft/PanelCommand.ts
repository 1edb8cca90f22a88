/**
 * Discrete commands exchanged between the panels and the simulator.
 */
export enum PanelCommand {
    LandingLightsOn = 'LandingLightsOn',
    LandingLightsOff = 'LandingLightsOff',
    TaxiLightsOn = 'TaxiLightsOn',
    TaxiLightsOff = 'TaxiLightsOff',
    StrobeLightsOn = 'StrobeLightsOn',
    StrobeLightsOff = 'StrobeLightsOff',
    NavLightsOn = 'NavLightsOn',
    NavLightsOff = 'NavLightsOff',
    FlapsUp = 'FlapsUp',
    FlapsDown = 'FlapsDown',
    ParkingBrakeOn = 'ParkingBrakeOn',
    ParkingBrakeOff = 'ParkingBrakeOff',
    LandingGearUp = 'LandingGearUp',
    LandingGearDown = 'LandingGearDown',
}

export interface HostEventMapping {
    /** Event name understood by the simulation host. */
    readonly name: string;
    readonly payload: number;
}

const HOST_EVENTS: Readonly<Record<PanelCommand, HostEventMapping>> = {
    [PanelCommand.LandingLightsOn]: { name: 'LANDING_LIGHTS_ON', payload: 0 },
    [PanelCommand.LandingLightsOff]: { name: 'LANDING_LIGHTS_OFF', payload: 0 },
    [PanelCommand.TaxiLightsOn]: { name: 'TAXI_LIGHTS_ON', payload: 0 },
    [PanelCommand.TaxiLightsOff]: { name: 'TAXI_LIGHTS_OFF', payload: 0 },
    [PanelCommand.StrobeLightsOn]: { name: 'STROBES_ON', payload: 0 },
    [PanelCommand.StrobeLightsOff]: { name: 'STROBES_OFF', payload: 0 },
    [PanelCommand.NavLightsOn]: { name: 'NAV_LIGHTS_ON', payload: 0 },
    [PanelCommand.NavLightsOff]: { name: 'NAV_LIGHTS_OFF', payload: 0 },
    [PanelCommand.FlapsUp]: { name: 'FLAPS_DECR', payload: 0 },
    [PanelCommand.FlapsDown]: { name: 'FLAPS_INCR', payload: 0 },
    [PanelCommand.ParkingBrakeOn]: { name: 'PARKING_BRAKE_SET', payload: 1 },
    [PanelCommand.ParkingBrakeOff]: { name: 'PARKING_BRAKE_SET', payload: 0 },
    [PanelCommand.LandingGearUp]: { name: 'GEAR_UP', payload: 0 },
    [PanelCommand.LandingGearDown]: { name: 'GEAR_DOWN', payload: 0 },
};

/** Every command, in host client-event id order. */
export const ALL_PANEL_COMMANDS: readonly PanelCommand[] = Object.values(PanelCommand);

export function hostEventFor(command: PanelCommand): HostEventMapping {
    return HOST_EVENTS[command];
}

export function hostEventId(command: PanelCommand): number {
    return ALL_PANEL_COMMANDS.indexOf(command);
}
