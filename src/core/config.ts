/**
 * Configuration resolution: explicit overrides, then `VBOX_*` environment variables, then defaults.
 * @module core/config
 */
import {z} from 'zod';

import {
    ProtocolVersion,
    VBOX_DEFAULT_CONNECT_TIMEOUT_MS,
    VBOX_DEFAULT_HEARTBEAT_MS,
    VBOX_DEFAULT_HOST,
    VBOX_DEFAULT_MAX_BUFFER_BYTES,
    VBOX_DEFAULT_PORT,
    VBOX_DEFAULT_RECONNECT_DELAY_MS,
    VBOX_DEFAULT_RECONNECT_MAX_DELAY_MS,
    VBOX_DEFAULT_REQUEST_BUFFER_MS,
    VBOX_DEFAULT_REQUEST_TIMEOUT_MS,
} from '../protocols/vbox/constants';
import {VBoxError} from '../protocols/vbox/errors';
import {LOG_LEVELS} from './logger';

export const ENV_PREFIX = 'VBOX_';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const millis = z.coerce.number().int().nonnegative();

const flag = z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    return value;
}, z.boolean());

export const VBoxConfigSchema = z.object({
    host: z.string().min(1).default(VBOX_DEFAULT_HOST),
    port: z.coerce.number().int().min(1).max(0xffff).default(VBOX_DEFAULT_PORT),
    username: z.string().default(''),
    password: z.string().default(''),
    version: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
        z.nativeEnum(ProtocolVersion),
    ).default(ProtocolVersion.V2),
    requestTimeoutMs: millis.min(1).default(VBOX_DEFAULT_REQUEST_TIMEOUT_MS),
    connectTimeoutMs: millis.min(1).default(VBOX_DEFAULT_CONNECT_TIMEOUT_MS),
    requestBufferMs: millis.default(VBOX_DEFAULT_REQUEST_BUFFER_MS),
    heartbeatIntervalMs: millis.default(VBOX_DEFAULT_HEARTBEAT_MS),
    autoReconnect: flag.default(true),
    reconnectStrategy: z.enum(['fixed', 'backoff']).default('backoff'),
    reconnectDelayMs: millis.default(VBOX_DEFAULT_RECONNECT_DELAY_MS),
    reconnectMaxDelayMs: millis.default(VBOX_DEFAULT_RECONNECT_MAX_DELAY_MS),
    reconnectMaxAttempts: z.coerce.number().int().nonnegative().default(0),
    maxBufferBytes: z.coerce.number().int().min(64).default(VBOX_DEFAULT_MAX_BUFFER_BYTES),
    ignoreAckLogs: flag.default(false),
    logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type VBoxConfig = z.output<typeof VBoxConfigSchema>;
export type VBoxConfigInput = z.input<typeof VBoxConfigSchema>;
export type ConfigKey = keyof VBoxConfig;

export const CONFIG_KEYS = Object.keys(VBoxConfigSchema.shape).filter(
    (key): key is ConfigKey => key in VBoxConfigSchema.shape,
);

/** `requestTimeoutMs` becomes `VBOX_REQUEST_TIMEOUT_MS`. */
export const envKeyFor = (key: string): string =>
    ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();

/** Collect the raw `VBOX_*` values present in `env`. Empty strings count as unset. */
export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): Partial<Record<ConfigKey, string>> => {
    const values: Partial<Record<ConfigKey, string>> = {};
    for (const key of CONFIG_KEYS) {
        const value = env[envKeyFor(key)];
        if (value !== undefined && value !== '') values[key] = value;
    }
    return values;
};

/**
 * Merge overrides over environment over defaults and validate the result.
 * Throws `VBoxError` with code `INVALID_CONFIG` listing every issue.
 */
export const resolveConfig = (
    overrides: Partial<VBoxConfigInput> = {},
    env: NodeJS.ProcessEnv = process.env,
): VBoxConfig => {
    const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
    const result = VBoxConfigSchema.safeParse({...readEnvConfig(env), ...defined});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
        throw new VBoxError({
            message: `Invalid vBox configuration: ${issues.join('; ')}`,
            domain: 'config',
            code: 'INVALID_CONFIG',
            details: {issues},
        });
    }
    return result.data;
};

/** Keep the first character of a secret, star the rest. */
export const maskSecret = (value: string): string => (value ? `${value[0]}${'*'.repeat(Math.max(value.length - 1, 3))}` : '');

/** Config with credentials masked, for logging. */
export const describeConfig = (config: VBoxConfig): VBoxConfig => ({
    ...config,
    username: maskSecret(config.username),
    password: maskSecret(config.password),
});
