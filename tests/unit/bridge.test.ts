import { afterEach, describe, it, expect, vi } from 'vitest';
import { PanelCommand } from '@aircraft/PanelCommand';
import { Bridge } from '@core/engine/Bridge';
import { BridgeEvent } from '@core/events/BridgeEvents';
import { DisconnectError, SerialOpenError } from '@panels/PanelErrors';
import type { TransportFactory } from '@serial/LineTransport';
import { setLogLevel } from '@utils/Logger';
import { FakeSimConnection, FakeSimulationHost, yieldingSleep } from '../helpers/FakeSimulationHost';
import { transportsFor } from '../helpers/FakeTransport';
import { MockPanel } from '../helpers/MockPanel';

const parkedTelemetry = {
  gearCenterPosition: 1,
  gearLeftPosition: 1,
  gearRightPosition: 1,
  airspeed: 0,
  parkingBrakeIndicator: true,
};

describe('Bridge', () => {
  it('should carry state to the panel and switches back to the simulator', async () => {
    const panel = new MockPanel('/dev/ttyMOCK0');
    const connection = new FakeSimConnection(
      { kind: 'open', applicationName: 'Test Simulator' },
      { kind: 'data', telemetry: parkedTelemetry }
    );
    const bridge = new Bridge({
      panels: [{ name: 'eventsim', type: 'eventsim', port: panel.path }],
      simulator: {},
      transports: transportsFor(panel),
      host: new FakeSimulationHost([connection]),
      sleep: yieldingSleep(),
    });

    const running = bridge.run();

    await vi.waitFor(() => expect(panel.parkingBrakeLamp()).toBe(true));
    expect(panel.connected).toBe(true);
    expect(panel.indicator('FRONT_GEAR_LED')).toBe(1);
    expect(bridge.panels[0]?.currentState).toBe('connected');

    panel.press('PARKING_BRAKE:0');
    await vi.waitFor(() => expect(connection.transmitted).toHaveLength(1));
    expect(connection.transmitted[0]).toEqual({
      command: PanelCommand.ParkingBrakeOff,
      mapping: { name: 'PARKING_BRAKE_SET', payload: 0 },
    });

    panel.unplug();
    const outcome = await running;

    expect(outcome.panels).toHaveLength(1);
    expect(outcome.panels[0]?.name).toBe('eventsim');
    expect(outcome.panels[0]?.error).toBeInstanceOf(DisconnectError);
    expect(connection.closed).toBe(true);
    expect(bridge.simulation.currentState).toBe('disconnected');
  });

  it('should keep other panels running when one fails to open', async () => {
    const panel = new MockPanel('/dev/ttyMOCK1');
    const working = transportsFor(panel);
    const transports: TransportFactory = {
      open: async options => {
        if (options.path === '/dev/ttyMISSING') {
          throw new Error('No such file or directory');
        }
        return working.open(options);
      },
    };
    const bridge = new Bridge({
      panels: [
        { name: 'missing', type: 'eventsim', port: '/dev/ttyMISSING' },
        { name: 'cockpit', type: 'eventsim', port: panel.path },
      ],
      simulator: {},
      transports,
      host: new FakeSimulationHost([new FakeSimConnection({ kind: 'open', applicationName: 'Sim' })]),
      sleep: yieldingSleep(),
    });
    const failed: string[] = [];
    bridge.events.on(BridgeEvent.PANEL_FAILED, ({ panel: name }) => failed.push(name));

    const running = bridge.run();
    await vi.waitFor(() => expect(panel.connected).toBe(true));
    expect(failed).toEqual(['missing']);

    panel.unplug();
    const outcome = await running;

    expect(outcome.panels.map(result => result.name)).toEqual(['missing', 'cockpit']);
    expect(outcome.panels[0]?.error).toBeInstanceOf(SerialOpenError);
    expect(outcome.panels[1]?.error).toBeInstanceOf(DisconnectError);
  });

  describe('debug log', () => {
    afterEach(() => {
      setLogLevel('silent');
      vi.restoreAllMocks();
    });

    function createIdleBridge(): Bridge {
      return new Bridge({
        panels: [{ name: 'cockpit', type: 'eventsim', port: '/dev/ttyMOCK2' }],
        simulator: {},
        transports: transportsFor(new MockPanel('/dev/ttyMOCK2')),
        host: new FakeSimulationHost([]),
      });
    }

    it('should log commands and simulator sessions', () => {
      setLogLevel('debug');
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const bridge = createIdleBridge();

      bridge.events.emit(BridgeEvent.PANEL_COMMAND, {
        panel: 'cockpit',
        token: 'PARKING_BRAKE:1',
        command: PanelCommand.ParkingBrakeOn,
      });
      bridge.events.emit(BridgeEvent.SIM_REGISTERED, { commandCount: 14 });
      bridge.events.emit(BridgeEvent.SIM_QUIT, { sessionNumber: 2 });
      bridge.events.emit(BridgeEvent.PANEL_DROPPED, { panel: 'cockpit' });

      expect(debug.mock.calls).toEqual([
        ['[Bridge] Panel "cockpit" sent PARKING_BRAKE:1 (ParkingBrakeOn)'],
        ['[Bridge] Simulator accepted 14 event mappings'],
        ['[Bridge] Simulator session 2 ended'],
        ['[Bridge] Panel "cockpit" dropped from the state fan-out'],
      ]);
    });

    it('should stay quiet above debug level', () => {
      setLogLevel('info');
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

      createIdleBridge().events.emit(BridgeEvent.SIM_QUIT, { sessionNumber: 1 });

      expect(debug).not.toHaveBeenCalled();
    });
  });

  it('should require at least one panel', () => {
    expect(
      () =>
        new Bridge({
          panels: [],
          simulator: {},
          transports: transportsFor(new MockPanel()),
          host: new FakeSimulationHost([]),
        })
    ).toThrow('At least one panel is required');
  });
});
