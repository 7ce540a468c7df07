/**
 * Client configuration
 *
 * Defaults match the reference server. Override in code through
 * resolveClientConfig(), or from the environment with configFromEnv().
 */

export interface ClientConfig {
    /** WebSocket URL of the server. */
    serverUrl: string;
    /** Name sent in hello. */
    playerName: string;
    /** Pixels per block. */
    pixelScale: number;
    /** Chunks kept loaded on each side of the player's chunk. */
    viewportRadiusX: number;
    viewportRadiusY: number;
    /** Receiver delay before each receive. */
    pollIntervalMs: number;
    /** Chat lines kept. */
    chatCapacity: number;
    inventorySlots: number;
    handshakeTimeoutMs: number;
    /** Block placement/break reach, in blocks. */
    interactRange: number;
    /** Horizontal speed sent with velocity changes, in blocks per second. */
    moveSpeed: number;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = Object.freeze({
    serverUrl: 'ws://127.0.0.1:8080',
    playerName: 'player',
    pixelScale: 25,
    viewportRadiusX: 2,
    viewportRadiusY: 2,
    pollIntervalMs: 16,
    chatCapacity: 50,
    inventorySlots: 9,
    handshakeTimeoutMs: 5000,
    interactRange: 8,
    moveSpeed: 5
});

function requireInteger(name: string, value: number, min: number, max: number = Number.MAX_SAFE_INTEGER): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
    }
}

function requirePositive(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive number, got ${value}`);
    }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws RangeError naming the first invalid setting
 */
export function resolveClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
    const config: ClientConfig = { ...DEFAULT_CLIENT_CONFIG };
    for (const [key, value] of Object.entries(overrides)) {
        if (!Object.hasOwn(DEFAULT_CLIENT_CONFIG, key)) {
            throw new RangeError(`Unknown config setting '${key}'`);
        }
        if (value !== undefined) Object.assign(config, { [key]: value });
    }

    if (typeof config.serverUrl !== 'string' || config.serverUrl.length === 0) {
        throw new RangeError('serverUrl must be a non-empty string');
    }
    if (typeof config.playerName !== 'string' || config.playerName.length === 0) {
        throw new RangeError('playerName must be a non-empty string');
    }
    requirePositive('pixelScale', config.pixelScale);
    requireInteger('viewportRadiusX', config.viewportRadiusX, 0);
    requireInteger('viewportRadiusY', config.viewportRadiusY, 0);
    if (!Number.isFinite(config.pollIntervalMs) || config.pollIntervalMs < 0) {
        throw new RangeError(`pollIntervalMs must be a non-negative number, got ${config.pollIntervalMs}`);
    }
    requireInteger('chatCapacity', config.chatCapacity, 1);
    // change_slot carries the slot index as a u8
    requireInteger('inventorySlots', config.inventorySlots, 1, 256);
    requirePositive('handshakeTimeoutMs', config.handshakeTimeoutMs);
    requirePositive('interactRange', config.interactRange);
    requirePositive('moveSpeed', config.moveSpeed);

    return config;
}

const ENV_PREFIX = 'TILESYNC_';

const STRING_SETTINGS = {
    SERVER_URL: 'serverUrl',
    PLAYER_NAME: 'playerName'
} as const;

const NUMBER_SETTINGS = {
    PIXEL_SCALE: 'pixelScale',
    VIEWPORT_RADIUS_X: 'viewportRadiusX',
    VIEWPORT_RADIUS_Y: 'viewportRadiusY',
    POLL_INTERVAL_MS: 'pollIntervalMs',
    CHAT_CAPACITY: 'chatCapacity',
    INVENTORY_SLOTS: 'inventorySlots',
    HANDSHAKE_TIMEOUT_MS: 'handshakeTimeoutMs',
    INTERACT_RANGE: 'interactRange',
    MOVE_SPEED: 'moveSpeed'
} as const;

/**
 * Read TILESYNC_* variables (e.g. TILESYNC_PIXEL_SCALE=30). Unset or empty
 * variables are left out, so the result can be passed to resolveClientConfig.
 *
 * @throws RangeError if a numeric variable does not parse
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
    const config: Partial<ClientConfig> = {};

    for (const [suffix, key] of Object.entries(STRING_SETTINGS)) {
        const raw = env[ENV_PREFIX + suffix];
        if (raw) config[key] = raw;
    }

    for (const [suffix, key] of Object.entries(NUMBER_SETTINGS)) {
        const raw = env[ENV_PREFIX + suffix];
        if (!raw) continue;
        const value = Number(raw);
        if (Number.isNaN(value)) {
            throw new RangeError(`${ENV_PREFIX}${suffix} must be a number, got '${raw}'`);
        }
        config[key] = value;
    }

    return config;
}
