import type { AircraftTelemetry } from '@aircraft/AircraftState';
import type { HostEventMapping, PanelCommand } from '@aircraft/PanelCommand';

/**
 * `error` ends the session; `exception` means the host rejected one request
 * and the session goes on.
 */
export type SimNotification =
    | { kind: 'open'; applicationName: string }
    | { kind: 'quit' }
    | { kind: 'data'; telemetry: AircraftTelemetry }
    | { kind: 'error'; error: Error }
    | { kind: 'exception'; code: number; sendId: number }
    | { kind: 'unknown'; description: string };

/**
 * One connection to the simulation host. Notifications are polled, never
 * pushed, so the simulation link decides when to look at them.
 */
export interface SimulationConnection {
    subscribeAircraftState(): void;
    mapEvent(command: PanelCommand, hostEventName: string): void;
    transmitEvent(command: PanelCommand, mapping: HostEventMapping): void;
    /** Next pending notification, or `null` when there is none. */
    nextNotification(): SimNotification | null;
    close(): void;
}

export interface SimulationHost {
    connect(appName: string): Promise<SimulationConnection>;
}
