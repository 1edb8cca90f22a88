import { parseArgs } from 'node:util';
import {
    type BridgeConfig,
    configForPort,
    ConfigParseError,
    ConfigValidationError,
    loadConfig,
} from '@config/BridgeConfig';
import { Bridge } from '@core/engine/Bridge';
import { formatPortList, listSerialPorts } from '@serial/listPorts';
import { serialTransports } from '@serial/SerialLineTransport';
import { SimConnectHost } from '@sim/SimConnectHost';
import { createLogger, setLogLevel } from '@utils/Logger';

const logger = createLogger('main');

const USAGE = `Usage: panel-bridge [--config <file>] [--list] [port]

  port             run one EventSim panel on this serial port
  -c, --config     JSON configuration file with one or more panels
  -l, --list       list the available serial ports
  -h, --help       show this help

Without arguments the available serial ports are listed.
Set LOG_LEVEL (debug, info, warn, error, silent) to change the log output.`;

type Invocation =
    | { action: 'help' }
    | { action: 'list' }
    | { action: 'run'; config: BridgeConfig };

function parseInvocation(argv: string[]): Invocation {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            config: { type: 'string', short: 'c' },
            list: { type: 'boolean', short: 'l' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help) return { action: 'help' };
    if (values.list) return { action: 'list' };
    if (values.config !== undefined) return { action: 'run', config: loadConfig(values.config) };

    const [port] = positionals;
    if (port === undefined) return { action: 'list' };
    return { action: 'run', config: configForPort(port) };
}

async function runBridge(config: BridgeConfig): Promise<number> {
    setLogLevel(config.logLevel);

    const { simulator } = config;
    const bridge = new Bridge({
        panels: Object.entries(config.panels).map(([name, panel]) => ({ name, ...panel })),
        simulator: {
            appName: simulator.appName,
            reconnectDelayMs: simulator.reconnectDelayMs,
            frameIntervalMs: simulator.frameIntervalMs,
        },
        transports: serialTransports,
        host: new SimConnectHost(
            simulator.host !== undefined && simulator.port !== undefined
                ? { remote: { host: simulator.host, port: simulator.port } }
                : {}
        ),
    });

    const outcome = await bridge.run();
    return outcome.panels.length > 0 ? 1 : 0;
}

async function main(): Promise<number> {
    let invocation: Invocation;
    try {
        invocation = parseInvocation(process.argv.slice(2));
    } catch (error) {
        if (error instanceof ConfigParseError || error instanceof ConfigValidationError) {
            logger.error(error.message);
        } else {
            logger.error(error instanceof Error ? error.message : String(error));
            console.log(USAGE);
        }
        return 1;
    }

    switch (invocation.action) {
        case 'help':
            console.log(USAGE);
            return 0;
        case 'list':
            console.log(formatPortList(await listSerialPorts()));
            return 0;
        case 'run':
            return runBridge(invocation.config);
    }
}

process.on('SIGINT', () => {
    logger.info('Interrupted, exiting');
    process.exit(0);
});

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        logger.error('Unexpected failure:', error);
        process.exitCode = 1;
    }
);
