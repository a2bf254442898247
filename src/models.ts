import { asObject, readBoolean, readList, readNumber, readObject, readString, readStringList } from "./codec";
import type { WireConfig, WireMessage } from "./protocol";

export type FileSystemEntryKind = "file" | "directory";

export interface FileSystemEntry {
	parentPath: string;
	name: string;
	kind: FileSystemEntryKind;
	sizeBytes: number;
}

/** Root of the device's flash filesystem; the firmware only lists this folder. */
export const FLASH_ROOT = "/flash";

export function fullPath(entry: FileSystemEntry): string {
	return `${entry.parentPath}/${entry.name}`;
}

export interface DeviceConfig {
	boardSerial: string;
	machineName: string;
	lastUpdated: string;
	/** Display order matters, keep it. */
	drivers: string[];
	jobs: string[];
}

export function emptyDeviceConfig(): DeviceConfig {
	return { boardSerial: "", machineName: "", lastUpdated: "", drivers: [], jobs: [] };
}

export interface DeviceTimeInfo {
	rtcTime: string;
	espTime: string;
	localTime: string;
	rtcAvailable: boolean;
}

export interface DownloadResult {
	/** Destination token the caller passed to `downloadFile`. */
	token: string;
	data: Uint8Array;
}

/**
 * FILE_LIST entries come either as `{name, type, size}` objects or as bare
 * file names. Anything else in the array is skipped.
 */
export function parseFileList(message: WireMessage): FileSystemEntry[] {
	const entries: FileSystemEntry[] = [];
	for (const item of readList(message, "files")) {
		if (typeof item === "string") {
			entries.push({ parentPath: FLASH_ROOT, name: item, kind: "file", sizeBytes: 0 });
			continue;
		}
		const obj = asObject(item);
		if (obj) {
			entries.push({
				parentPath: FLASH_ROOT,
				name: readString(obj, "name"),
				kind: readString(obj, "type") === "dir" ? "directory" : "file",
				sizeBytes: readNumber(obj, "size"),
			});
		}
	}
	return entries;
}

export function parseConfig(message: WireMessage): DeviceConfig {
	const cfg = readObject(message, "config");
	return {
		boardSerial: readString(cfg, "board_serial"),
		machineName: readString(cfg, "Machine"),
		lastUpdated: readString(cfg, "last_updated"),
		drivers: readStringList(cfg, "Driver"),
		jobs: readStringList(cfg, "Jobs"),
	};
}

export function toWireConfig(config: DeviceConfig): WireConfig {
	return {
		board_serial: config.boardSerial,
		Machine: config.machineName,
		last_updated: config.lastUpdated,
		Driver: [...config.drivers],
		Jobs: [...config.jobs],
	};
}

export function parseTimeInfo(message: WireMessage): DeviceTimeInfo {
	return {
		rtcTime: readString(message, "rtc"),
		espTime: readString(message, "esp"),
		localTime: readString(message, "local"),
		rtcAvailable: readBoolean(message, "m5_available"),
	};
}

/**
 * SYNC_TIME wants unpadded calendar fields: "2024,3,7,9,5,0". The device RTC
 * runs on UTC, so callers syncing the clock pass `utc`.
 */
export function formatSyncTime(date: Date, utc = false): string {
	const fields = utc
		? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
		: [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];
	return fields.join(",");
}
