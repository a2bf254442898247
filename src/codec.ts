import { FrameDecodeError, HexDecodeError, describeError } from "./errors";
import type { DeviceCommand, JsonObject, JsonValue, WireMessage } from "./protocol";

export type DecodeResult = { ok: true; message: WireMessage } | { ok: false; error: FrameDecodeError };

function isJsonObject(value: JsonValue): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze(value: JsonValue) {
	if (Array.isArray(value)) {
		value.forEach(deepFreeze);
		Object.freeze(value);
	} else if (isJsonObject(value)) {
		Object.values(value).forEach(deepFreeze);
		Object.freeze(value);
	}
}

/** Decoded messages are frozen all the way down; subscribers share one instance. */
export function decodeFrame(frame: string): DecodeResult {
	let parsed: JsonValue;
	try {
		parsed = JSON.parse(frame);
	} catch (err) {
		return { ok: false, error: new FrameDecodeError(frame, describeError(err), { cause: err }) };
	}
	if (!isJsonObject(parsed)) {
		return { ok: false, error: new FrameDecodeError(frame, "not a JSON object") };
	}
	deepFreeze(parsed);
	return { ok: true, message: parsed };
}

export function messageType(message: WireMessage): string | undefined {
	const type = message["type"];
	return typeof type === "string" ? type : undefined;
}

export function encodeCommand(command: DeviceCommand): Uint8Array {
	return Buffer.from(`${JSON.stringify(command)}\n`, "utf8");
}

export function encodeRawLine(text: string): Uint8Array {
	const line = text.endsWith("\n") ? text : `${text}\n`;
	return Buffer.from(line, "utf8");
}

export function bytesToHex(bytes: Uint8Array): string {
	let hex = "";
	for (const byte of bytes) {
		hex += byte.toString(16).padStart(2, "0");
	}
	return hex;
}

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export function hexToBytes(hex: string): Uint8Array {
	if (hex.length % 2 !== 0) {
		throw new HexDecodeError(`odd length ${hex.length}`);
	}
	if (!HEX_PATTERN.test(hex)) {
		throw new HexDecodeError("contains non-hex characters");
	}
	const bytes = new Uint8Array(hex.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

// Field readers. Device payloads are partial more often than not, so every
// reader has an explicit fallback instead of failing on a missing key.

export function readString(source: Readonly<JsonObject>, key: string, fallback = ""): string {
	const value = source[key];
	return typeof value === "string" ? value : fallback;
}

export function readNumber(source: Readonly<JsonObject>, key: string, fallback = 0): number {
	const value = source[key];
	return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function readBoolean(source: Readonly<JsonObject>, key: string, fallback = false): boolean {
	const value = source[key];
	return typeof value === "boolean" ? value : fallback;
}

export function readList(source: Readonly<JsonObject>, key: string): JsonValue[] {
	const value = source[key];
	return Array.isArray(value) ? value : [];
}

/** Non-string items are dropped; order is kept. */
export function readStringList(source: Readonly<JsonObject>, key: string): string[] {
	return readList(source, key).filter((item): item is string => typeof item === "string");
}

export function readObject(source: Readonly<JsonObject>, key: string): Readonly<JsonObject> {
	const value = source[key];
	return value !== undefined && isJsonObject(value) ? value : {};
}

export function asObject(value: JsonValue): Readonly<JsonObject> | undefined {
	return isJsonObject(value) ? value : undefined;
}
