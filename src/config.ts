export interface SerialSettings {
	baudRate: number;
	dataBits: 8;
	parity: "none";
	stopBits: 1;
}

export interface SessionConfig {
	connectionTimeoutMs: number;
	heartbeatIntervalMs: number;
	pongTimeoutMs: number;
	/** Boot noise after a DTR-triggered reset is discarded for this long. */
	settleDelayMs: number;
	clientId: string;
	protocolVersion: number;
	expectedDevice: string;
	serial: SerialSettings;
	platform: NodeJS.Platform;
}

export const DEFAULT_SERIAL_SETTINGS: SerialSettings = {
	baudRate: 115200,
	dataBits: 8,
	parity: "none",
	stopBits: 1,
};

export const DEFAULT_CONFIG: SessionConfig = {
	connectionTimeoutMs: 5000,
	heartbeatIntervalMs: 3000,
	pongTimeoutMs: 10000,
	settleDelayMs: 1000,
	clientId: "esp-serial-link",
	protocolVersion: 1,
	expectedDevice: "ESP32",
	serial: DEFAULT_SERIAL_SETTINGS,
	platform: process.platform,
};

export type ConfigOverrides = Partial<Omit<SessionConfig, "serial">> & { serial?: Partial<SerialSettings> };

type Env = Record<string, string | undefined>;

const positiveInt = (raw: string | undefined): number | undefined => {
	if (raw === undefined || raw.trim() === "") return undefined;
	const value = Number(raw);
	return Number.isInteger(value) && value > 0 ? value : undefined;
};

function fromEnv(env: Env): ConfigOverrides {
	const overrides: ConfigOverrides = {};
	const connectionTimeoutMs = positiveInt(env.ESP_LINK_CONNECTION_TIMEOUT_MS);
	if (connectionTimeoutMs !== undefined) overrides.connectionTimeoutMs = connectionTimeoutMs;
	const heartbeatIntervalMs = positiveInt(env.ESP_LINK_HEARTBEAT_INTERVAL_MS);
	if (heartbeatIntervalMs !== undefined) overrides.heartbeatIntervalMs = heartbeatIntervalMs;
	const pongTimeoutMs = positiveInt(env.ESP_LINK_PONG_TIMEOUT_MS);
	if (pongTimeoutMs !== undefined) overrides.pongTimeoutMs = pongTimeoutMs;
	const settleDelayMs = positiveInt(env.ESP_LINK_SETTLE_DELAY_MS);
	if (settleDelayMs !== undefined) overrides.settleDelayMs = settleDelayMs;
	const baudRate = positiveInt(env.ESP_LINK_BAUD_RATE);
	if (baudRate !== undefined) overrides.serial = { baudRate };
	const clientId = env.ESP_LINK_CLIENT_ID?.trim();
	if (clientId) overrides.clientId = clientId;
	return overrides;
}

/**
 * Defaults, then ESP_LINK_* environment variables, then explicit overrides.
 * Unparseable or non-positive environment values are ignored.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): SessionConfig {
	const envOverrides = fromEnv(env);
	return {
		...DEFAULT_CONFIG,
		...envOverrides,
		...overrides,
		serial: { ...DEFAULT_SERIAL_SETTINGS, ...envOverrides.serial, ...overrides.serial },
	};
}
