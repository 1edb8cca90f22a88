import {
    DataRequestFlag,
    EventFlag,
    NotificationPriority,
    open,
    Protocol,
    SimConnectConstants,
    type SimConnectConnection,
    SimConnectDataType,
    SimConnectPeriod,
} from 'node-simconnect';
import type { AircraftTelemetry } from '@aircraft/AircraftState';
import { hostEventId, type HostEventMapping, type PanelCommand } from '@aircraft/PanelCommand';
import type { SimNotification, SimulationConnection, SimulationHost } from './SimulationHost';

const AIRCRAFT_DEFINITION_ID = 0;
const AIRCRAFT_REQUEST_ID = 0;

interface DataField {
    name: string;
    unit: string | null;
    type: SimConnectDataType;
}

/** Read back in this order by `readAircraftTelemetry`. */
export const AIRCRAFT_DATA_FIELDS: readonly DataField[] = [
    { name: 'GEAR CENTER POSITION', unit: 'percent over 100', type: SimConnectDataType.FLOAT64 },
    { name: 'GEAR LEFT POSITION', unit: 'percent over 100', type: SimConnectDataType.FLOAT64 },
    { name: 'GEAR RIGHT POSITION', unit: 'percent over 100', type: SimConnectDataType.FLOAT64 },
    { name: 'AIRSPEED INDICATED', unit: 'knots', type: SimConnectDataType.FLOAT64 },
    { name: 'BRAKE PARKING INDICATOR', unit: 'Bool', type: SimConnectDataType.INT32 },
];

export interface TelemetryReader {
    readFloat64(): number;
    readInt32(): number;
}

export function readAircraftTelemetry(reader: TelemetryReader): AircraftTelemetry {
    return {
        gearCenterPosition: reader.readFloat64(),
        gearLeftPosition: reader.readFloat64(),
        gearRightPosition: reader.readFloat64(),
        airspeed: reader.readFloat64(),
        parkingBrakeIndicator: reader.readInt32() !== 0,
    };
}

export interface SimConnectHostOptions {
    /** Connect over the network instead of the local SimConnect pipe/config. */
    remote?: { host: string; port: number };
}

/** `SimulationHost` backed by the `node-simconnect` SDK. */
export class SimConnectHost implements SimulationHost {
    constructor(private readonly options: SimConnectHostOptions = {}) {}

    async connect(appName: string): Promise<SimulationConnection> {
        const { recvOpen, handle } = await open(
            appName,
            Protocol.FSX_SP2,
            this.options.remote ? { remote: this.options.remote } : undefined
        );
        return new SimConnectSession(handle, recvOpen.applicationName);
    }
}

class SimConnectSession implements SimulationConnection {
    private readonly pending: SimNotification[] = [];
    private closed = false;

    constructor(
        private readonly handle: SimConnectConnection,
        applicationName: string
    ) {
        this.pending.push({ kind: 'open', applicationName });

        handle.on('simObjectData', recvSimObjectData => {
            if (recvSimObjectData.requestID !== AIRCRAFT_REQUEST_ID) {
                this.pending.push({
                    kind: 'unknown',
                    description: `data for request ${recvSimObjectData.requestID}`,
                });
                return;
            }
            this.pending.push({ kind: 'data', telemetry: readAircraftTelemetry(recvSimObjectData.data) });
        });
        handle.on('quit', () => {
            this.pending.push({ kind: 'quit' });
        });
        handle.on('close', () => {
            if (!this.closed) {
                this.pending.push({ kind: 'error', error: new Error('SimConnect connection closed') });
            }
        });
        handle.on('error', error => {
            this.pending.push({
                kind: 'error',
                error: error instanceof Error ? error : new Error(String(error)),
            });
        });
        handle.on('exception', recvException => {
            this.pending.push({
                kind: 'exception',
                code: recvException.exception,
                sendId: recvException.sendId,
            });
        });
    }

    subscribeAircraftState(): void {
        for (const field of AIRCRAFT_DATA_FIELDS) {
            this.handle.addToDataDefinition(AIRCRAFT_DEFINITION_ID, field.name, field.unit, field.type);
        }
        this.handle.requestDataOnSimObject(
            AIRCRAFT_REQUEST_ID,
            AIRCRAFT_DEFINITION_ID,
            SimConnectConstants.OBJECT_ID_USER,
            SimConnectPeriod.SIM_FRAME,
            DataRequestFlag.DATA_REQUEST_FLAG_CHANGED
        );
    }

    mapEvent(command: PanelCommand, hostEventName: string): void {
        this.handle.mapClientEventToSimEvent(hostEventId(command), hostEventName);
    }

    transmitEvent(command: PanelCommand, mapping: HostEventMapping): void {
        this.handle.transmitClientEvent(
            SimConnectConstants.OBJECT_ID_USER,
            hostEventId(command),
            mapping.payload,
            NotificationPriority.HIGHEST,
            EventFlag.EVENT_FLAG_GROUPID_IS_PRIORITY
        );
    }

    nextNotification(): SimNotification | null {
        return this.pending.shift() ?? null;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.handle.close();
    }
}
