import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PANEL_TYPES } from '@panels/PanelProfiles';
import {
    DEFAULT_APP_NAME,
    DEFAULT_FRAME_INTERVAL_MS,
    DEFAULT_RECONNECT_DELAY_MS,
} from '@sim/SimulationLink';
import { isLogLevel, LOG_LEVELS } from '@utils/Logger';

const positiveMs = z.number().int().positive();

export const PanelConfigSchema = z.object({
    type: z.enum(PANEL_TYPES).default('eventsim'),
    port: z.string().min(1, 'port must not be empty'),
    readTimeoutMs: positiveMs.optional(),
    resetDelayMs: z.number().int().nonnegative().optional(),
    keepaliveIntervalMs: positiveMs.optional(),
    bannerTimeoutMs: positiveMs.optional(),
});

export const SimulatorConfigSchema = z.object({
    appName: z.string().min(1).default(DEFAULT_APP_NAME),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    reconnectDelayMs: positiveMs.default(DEFAULT_RECONNECT_DELAY_MS),
    frameIntervalMs: positiveMs.default(DEFAULT_FRAME_INTERVAL_MS),
});

export const BridgeConfigSchema = z
    .object({
        logLevel: z.enum(LOG_LEVELS).default('info'),
        simulator: SimulatorConfigSchema.default({}),
        panels: z
            .record(z.string().min(1), PanelConfigSchema)
            .refine(panels => Object.keys(panels).length > 0, {
                message: 'at least one panel must be configured',
            }),
    })
    .refine(config => (config.simulator.host === undefined) === (config.simulator.port === undefined), {
        message: 'simulator.host and simulator.port must be set together',
        path: ['simulator'],
    });

export type PanelConfig = z.infer<typeof PanelConfigSchema>;
export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export class ConfigParseError extends Error {
    constructor(
        readonly source: string,
        cause: unknown
    ) {
        super(
            `Could not read configuration from ${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { cause }
        );
        this.name = 'ConfigParseError';
    }
}

export class ConfigValidationError extends Error {
    constructor(
        readonly source: string,
        readonly issues: string[]
    ) {
        super(`Invalid configuration in ${source}:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigValidationError';
    }
}

export function validateConfig(input: unknown, source = 'configuration'): BridgeConfig {
    const result = BridgeConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigValidationError(
            source,
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    readFile?: (path: string) => string;
}

/** Reads and validates a JSON config file. `LOG_LEVEL` overrides `logLevel`. */
export function loadConfig(path: string, options: LoadConfigOptions = {}): BridgeConfig {
    const readFile = options.readFile ?? ((file: string) => readFileSync(file, 'utf8'));

    let raw: unknown;
    try {
        raw = JSON.parse(readFile(path));
    } catch (error) {
        throw new ConfigParseError(path, error);
    }

    return applyEnvironment(validateConfig(raw, path), options.env ?? process.env);
}

/** Configuration for a single EventSim panel given on the command line. */
export function configForPort(port: string, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
    return applyEnvironment(validateConfig({ panels: { eventsim: { port } } }, 'command line'), env);
}

function applyEnvironment(config: BridgeConfig, env: NodeJS.ProcessEnv): BridgeConfig {
    const level = env.LOG_LEVEL?.toLowerCase();
    if (level === undefined || level === '') return config;
    if (!isLogLevel(level)) {
        throw new ConfigValidationError('LOG_LEVEL', [
            `expected one of ${LOG_LEVELS.join(', ')}, got "${level}"`,
        ]);
    }
    return { ...config, logLevel: level };
}
