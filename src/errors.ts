export type EspLinkErrorCode =
	| "transport-open"
	| "transport-write"
	| "transport-read"
	| "frame-decode"
	| "hex-decode"
	| "protocol-timeout"
	| "device-reported";

/**
 * Base class for everything published on the error channel. Command methods
 * never throw these; they reach callers only as events.
 */
export class EspLinkError extends Error {
	readonly code: EspLinkErrorCode;

	constructor(code: EspLinkErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "EspLinkError";
		this.code = code;
	}
}

/** Port busy or missing. `connect` reports it and stays disconnected. */
export class TransportOpenError extends EspLinkError {
	readonly path: string;

	constructor(path: string, reason: string, options?: { cause?: unknown }) {
		super("transport-open", `Failed to open ${path}: ${reason}`, options);
		this.name = "TransportOpenError";
		this.path = path;
	}
}

export class TransportWriteError extends EspLinkError {
	constructor(reason: string, options?: { cause?: unknown }) {
		super("transport-write", `Write failed: ${reason}`, options);
		this.name = "TransportWriteError";
	}
}

export class TransportReadError extends EspLinkError {
	constructor(reason: string, options?: { cause?: unknown }) {
		super("transport-read", `Read error: ${reason}`, options);
		this.name = "TransportReadError";
	}
}

export class FrameDecodeError extends EspLinkError {
	readonly frame: string;

	constructor(frame: string, reason: string, options?: { cause?: unknown }) {
		super("frame-decode", `Cannot decode line: ${reason}`, options);
		this.name = "FrameDecodeError";
		this.frame = frame;
	}
}

export class HexDecodeError extends EspLinkError {
	constructor(reason: string) {
		super("hex-decode", `Invalid hex payload: ${reason}`);
		this.name = "HexDecodeError";
	}
}

export type TimeoutPhase = "handshake" | "heartbeat";

export class ProtocolTimeoutError extends EspLinkError {
	readonly phase: TimeoutPhase;

	constructor(phase: TimeoutPhase, message: string) {
		super("protocol-timeout", message);
		this.name = "ProtocolTimeoutError";
		this.phase = phase;
	}
}

/** NAK, ERROR or a device-side disconnect report. */
export class DeviceReportedError extends EspLinkError {
	readonly command: string | undefined;

	constructor(message: string, command?: string) {
		super("device-reported", message);
		this.name = "DeviceReportedError";
		this.command = command;
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
