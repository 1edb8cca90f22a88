import { describe, it, expect, vi } from 'vitest';
import { type AircraftState, createAircraftState, LandingGearStatus } from '@aircraft/AircraftState';
import { PanelCommand } from '@aircraft/PanelCommand';
import { BridgeEvent, createBridgeEventBus } from '@core/events/BridgeEvents';
import { EventRouter } from '@core/router/EventRouter';
import { DisconnectError, SerialOpenError, WrongDeviceError } from '@panels/PanelErrors';
import { PanelLink, type PanelLinkState } from '@panels/PanelLink';
import {
  AIRSPEED_INDICATOR_PROFILE,
  EVENTSIM_PROFILE,
  type PanelProfile,
} from '@panels/PanelProfiles';
import type { TransportFactory } from '@serial/LineTransport';
import { FakeTransport, transportsFor } from '../helpers/FakeTransport';

const PATH = '/dev/ttyTEST0';

const parked = createAircraftState({
  parkingBrake: true,
  gearCenter: LandingGearStatus.Down,
  gearLeft: LandingGearStatus.Down,
  gearRight: LandingGearStatus.Down,
  airspeed: 0,
});

const INDICATORS_PARKED = [
  'PARKING_BRAKE:1',
  'FRONT_GEAR_LED:1',
  'LEFT_GEAR_LED:1',
  'RIGHT_GEAR_LED:1',
];

/** Every read advances the clock by 20 ms. */
function createHarness(
  script: Array<string | null>,
  profile: PanelProfile = EVENTSIM_PROFILE,
  factory?: TransportFactory
) {
  const router = new EventRouter();
  const endpoints = router.registerPanel('main');
  const sim = router.connectSimulation();

  let clock = 0;
  const transport = new FakeTransport(PATH, script);
  transport.onRead = () => {
    clock += 20;
  };
  const transports = transportsFor(transport);
  const sleep = vi.fn(async (_ms: number) => {});
  const events = createBridgeEventBus();

  const link = new PanelLink({ name: 'main', path: PATH, profile }, endpoints, {
    transports: factory ?? transports,
    events,
    now: () => clock,
    sleep,
  });

  return {
    link,
    endpoints,
    transport,
    transports,
    sim,
    sleep,
    events,
    broadcast: (state: AircraftState) => {
      sim.fanOut.broadcast(state);
    },
  };
}

describe('PanelLink', () => {
  describe('connecting', () => {
    it('should reset the board and wait before handshaking', async () => {
      const { link, transport, transports, sleep } = createHarness(['SYN|ACK', 'RST']);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transports.opened).toEqual([{ path: PATH, baudRate: 115200, delimiter: '\n' }]);
      expect(transport.resets).toBe(1);
      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('should ignore unrelated lines until the handshake reply', async () => {
      const { link, transport } = createHarness(['garbage', null, 'SYN|ACK', 'RST']);

      await expect(link.run()).rejects.toThrow(`The panel on '${PATH}' disconnected`);

      expect(transport.written).toEqual(['SYN', 'ACK']);
      expect(transport.closed).toBe(true);
    });

    it('should fail when the panel resets during the handshake', async () => {
      const { link, transport } = createHarness(['RST']);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN']);
    });

    it('should report a port that cannot be opened and release its endpoints', async () => {
      const failing: TransportFactory = {
        open: async () => {
          throw new Error('No such file or directory');
        },
      };
      const { link, sim, sleep } = createHarness([], EVENTSIM_PROFILE, failing);

      const failure = link.run();
      await expect(failure).rejects.toBeInstanceOf(SerialOpenError);
      await expect(failure).rejects.toThrow(
        `Failed to connect with panel on serial port '${PATH}': No such file or directory`
      );

      expect(sleep).not.toHaveBeenCalled();
      expect(sim.commands.isDisconnected).toBe(true);
      expect(sim.fanOut.prune()).toEqual(['main']);
      expect(link.currentState).toBe('disconnected');
    });

    it('should refuse to run twice', async () => {
      const { link } = createHarness(['SYN|ACK', 'RST']);

      const first = link.run();
      await expect(link.run()).rejects.toThrow('Panel link "main" is already running');
      await expect(first).rejects.toBeInstanceOf(DisconnectError);
    });
  });

  describe('state updates', () => {
    it('should write the indicators once for repeated equal states', async () => {
      const { link, transport, broadcast } = createHarness(['SYN|ACK', null, null, 'RST']);
      broadcast(parked);
      broadcast(parked);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK', ...INDICATORS_PARKED]);
    });

    it('should write the indicators again when any field changes', async () => {
      const { link, transport, broadcast } = createHarness(['SYN|ACK', null, null, null, 'RST']);
      broadcast(parked);
      broadcast(createAircraftState({ ...parked, airspeed: 12 }));
      broadcast(createAircraftState({ ...parked, parkingBrake: false }));

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual([
        'SYN',
        'ACK',
        ...INDICATORS_PARKED,
        ...INDICATORS_PARKED,
        'PARKING_BRAKE:0',
        'FRONT_GEAR_LED:1',
        'LEFT_GEAR_LED:1',
        'RIGHT_GEAR_LED:1',
      ]);
    });

    it('should drain states that arrive faster than the read timeout', async () => {
      const { link, endpoints, transport, broadcast } = createHarness(
        ['Name<Airspeed-Indicator>', null, null, null, 'RST'],
        AIRSPEED_INDICATOR_PROFILE
      );
      const queuedAtRead: number[] = [];
      let knots = 0;
      transport.onRead = () => {
        queuedAtRead.push(endpoints.states.pending);
        for (let frame = 0; frame < 3; frame++) {
          knots++;
          broadcast(createAircraftState({ ...parked, airspeed: knots }));
        }
      };

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(queuedAtRead).toEqual([0, 0, 0, 0, 0]);
      expect(transport.written).toEqual(
        Array.from(
          { length: 12 },
          (_, index) => `Type<I-A>::Target<Airspeed-Indicator>::Content<${index + 1}>::Origin<Interface>;`
        )
      );
    });
  });

  describe('panel input', () => {
    it('should answer PING with PONG and ignore PONG', async () => {
      const { link, transport } = createHarness(['SYN|ACK', 'PING', 'PONG', 'RST']);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK', 'PONG']);
    });

    it('should acknowledge a repeated handshake from a rebooted panel', async () => {
      const { link, transport } = createHarness(['SYN|ACK', 'SYN|ACK', 'RST']);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK', 'ACK']);
    });

    it('should forward decoded commands in order and skip unknown tokens', async () => {
      const { link, sim, events } = createHarness([
        'SYN|ACK',
        'PARKING_BRAKE:1',
        'BOGUS',
        'FLAPS_DN',
        'RST',
      ]);
      const received: PanelCommand[] = [];
      events.on(BridgeEvent.PANEL_COMMAND, ({ command }) => received.push(command));

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(sim.commands.tryReceive()).toEqual({
        status: 'message',
        value: PanelCommand.ParkingBrakeOn,
      });
      expect(sim.commands.tryReceive()).toEqual({ status: 'message', value: PanelCommand.FlapsDown });
      expect(sim.commands.tryReceive()).toEqual({ status: 'disconnected' });
      expect(received).toEqual([PanelCommand.ParkingBrakeOn, PanelCommand.FlapsDown]);
    });

    it('should keep serving the panel after the simulation side is gone', async () => {
      const { link, transport, sim } = createHarness(['SYN|ACK', 'LANDING_GEAR:0', 'PING', 'RST']);
      sim.commands.close();

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK', 'PONG']);
    });
  });

  describe('keepalive', () => {
    it('should ping after the keepalive interval without writes', async () => {
      const script: Array<string | null> = ['SYN|ACK', ...Array<null>(25).fill(null), 'RST'];
      const { link, transport } = createHarness(script);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK', 'PING']);
    });

    it('should not ping before the interval has passed', async () => {
      const script: Array<string | null> = ['SYN|ACK', ...Array<null>(24).fill(null), 'RST'];
      const { link, transport } = createHarness(script);

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transport.written).toEqual(['SYN', 'ACK']);
    });
  });

  describe('airspeed indicator', () => {
    it('should accept the device banner and send whole knots', async () => {
      const { link, transport, transports, sim, broadcast } = createHarness(
        ['Name<Airspeed-Indicator>', 'PARKING_BRAKE:1', null, 'RST'],
        AIRSPEED_INDICATOR_PROFILE
      );
      broadcast(createAircraftState({ ...parked, airspeed: 121.9 }));

      await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

      expect(transports.opened).toEqual([{ path: PATH, baudRate: 38400, delimiter: ';' }]);
      expect(transport.written).toEqual([
        'Type<I-A>::Target<Airspeed-Indicator>::Content<121>::Origin<Interface>;',
      ]);
      expect(sim.commands.tryReceive()).toEqual({ status: 'disconnected' });
    });

    it('should reject a device with a different banner', async () => {
      const { link } = createHarness(['Name<Heading-Indicator>'], AIRSPEED_INDICATOR_PROFILE);

      const failure = link.run();
      await expect(failure).rejects.toBeInstanceOf(WrongDeviceError);
      await expect(failure).rejects.toMatchObject({
        expected: 'Name<Airspeed-Indicator>',
        received: 'Name<Heading-Indicator>',
      });
    });

    it('should give up when no banner arrives in time', async () => {
      const script: Array<string | null> = Array<null>(300).fill(null);
      const { link, transport } = createHarness(script, AIRSPEED_INDICATOR_PROFILE);

      const failure = link.run();
      await expect(failure).rejects.toBeInstanceOf(WrongDeviceError);
      await expect(failure).rejects.toMatchObject({ received: null });

      expect(transport.closed).toBe(true);
    });
  });

  it('should emit state changes through the connection lifecycle', async () => {
    const { link, events } = createHarness(['SYN|ACK', 'RST']);
    const states: PanelLinkState[] = [];
    const failures: string[] = [];
    events.on(BridgeEvent.PANEL_STATE_CHANGE, ({ current }) => states.push(current));
    events.on(BridgeEvent.PANEL_FAILED, ({ error }) => failures.push(error.kind));

    await expect(link.run()).rejects.toBeInstanceOf(DisconnectError);

    expect(states).toEqual(['opening', 'handshaking', 'connected', 'disconnected']);
    expect(failures).toEqual(['disconnect']);
  });
});
