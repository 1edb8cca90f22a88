/**
 * Aircraft state as seen by the panels.
 * Built from one complete telemetry record; never partially filled.
 */

export enum LandingGearStatus {
    Unknown = 'unknown',
    Up = 'up',
    Down = 'down',
}

export interface AircraftState {
    readonly parkingBrake: boolean;
    readonly gearCenter: LandingGearStatus;
    readonly gearLeft: LandingGearStatus;
    readonly gearRight: LandingGearStatus;
    readonly airspeed: number; // knots (indicated)
}

/**
 * Raw telemetry record as delivered by the simulation host.
 * Gear positions are fractions, 0 = retracted and 1 = extended.
 */
export interface AircraftTelemetry {
    gearCenterPosition: number;
    gearLeftPosition: number;
    gearRightPosition: number;
    airspeed: number;
    parkingBrakeIndicator: boolean;
}

const GEAR_STATUS_CODES: Record<LandingGearStatus, number> = {
    [LandingGearStatus.Up]: 0,
    [LandingGearStatus.Down]: 1,
    [LandingGearStatus.Unknown]: 2,
};

export function gearStatusFromPosition(position: number): LandingGearStatus {
    if (position === 0) return LandingGearStatus.Up;
    if (position === 1) return LandingGearStatus.Down;
    return LandingGearStatus.Unknown;
}

export function gearStatusCode(status: LandingGearStatus): number {
    return GEAR_STATUS_CODES[status];
}

export function createAircraftState(fields: AircraftState): AircraftState {
    return Object.freeze({
        parkingBrake: fields.parkingBrake,
        gearCenter: fields.gearCenter,
        gearLeft: fields.gearLeft,
        gearRight: fields.gearRight,
        airspeed: fields.airspeed,
    });
}

export function aircraftStateFromTelemetry(telemetry: AircraftTelemetry): AircraftState {
    const { gearCenterPosition, gearLeftPosition, gearRightPosition, airspeed } = telemetry;
    for (const [field, value] of Object.entries({
        gearCenterPosition,
        gearLeftPosition,
        gearRightPosition,
        airspeed,
    })) {
        if (typeof value !== 'number') {
            throw new TypeError(`Incomplete telemetry record: ${field} is missing`);
        }
    }
    if (typeof telemetry.parkingBrakeIndicator !== 'boolean') {
        throw new TypeError('Incomplete telemetry record: parkingBrakeIndicator is missing');
    }

    return createAircraftState({
        parkingBrake: telemetry.parkingBrakeIndicator,
        gearCenter: gearStatusFromPosition(gearCenterPosition),
        gearLeft: gearStatusFromPosition(gearLeftPosition),
        gearRight: gearStatusFromPosition(gearRightPosition),
        airspeed,
    });
}

export function aircraftStatesEqual(a: AircraftState, b: AircraftState): boolean {
    return (
        a.parkingBrake === b.parkingBrake &&
        a.gearCenter === b.gearCenter &&
        a.gearLeft === b.gearLeft &&
        a.gearRight === b.gearRight &&
        a.airspeed === b.airspeed
    );
}

export function cloneAircraftState(state: AircraftState): AircraftState {
    return createAircraftState(state);
}
