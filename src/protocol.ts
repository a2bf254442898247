export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
	[key: string]: JsonValue;
}

/** A decoded line from the device. `type` is expected but may be missing. */
export type WireMessage = Readonly<JsonObject>;

// Client -> device

export interface HandshakeRequest {
	type: "HANDSHAKE";
	device: string;
	version: number;
}

export interface PingRequest {
	type: "PING";
}

export interface ListFilesRequest {
	type: "LIST_FILES";
}

export interface UploadFileRequest {
	type: "UPLOAD_FILE";
	filename: string;
	hexdata: string;
}

export interface DownloadFileRequest {
	type: "DOWNLOAD_FILE";
	filename: string;
}

export interface DeleteFileRequest {
	type: "DELETE_FILE";
	filename: string;
}

export interface ReadConfigRequest {
	type: "READ_CONFIG";
}

/** Key spelling is fixed by the firmware. */
export interface WireConfig {
	board_serial: string;
	Machine: string;
	last_updated: string;
	Driver: string[];
	Jobs: string[];
}

export interface WriteConfigRequest {
	type: "WRITE_CONFIG";
	config: WireConfig;
}

export interface GetSerialRequest {
	type: "GET_SERIAL";
}

export interface FetchTimeRequest {
	type: "FETCH_TIME";
}

export interface SyncTimeRequest {
	type: "SYNC_TIME";
	// "year,month,day,hour,minute,second"
	time: string;
}

export interface ClearCsvRequest {
	type: "CLEAR_CSV";
	filename: string;
}

export type DeviceCommand =
	| HandshakeRequest
	| PingRequest
	| ListFilesRequest
	| UploadFileRequest
	| DownloadFileRequest
	| DeleteFileRequest
	| ReadConfigRequest
	| WriteConfigRequest
	| GetSerialRequest
	| FetchTimeRequest
	| SyncTimeRequest
	| ClearCsvRequest;

export type CommandType = DeviceCommand["type"];

// Device -> client

export const REPORT_TYPES = [
	"HANDSHAKE",
	"PONG",
	"ACK",
	"NAK",
	"ERROR",
	"SERIAL",
	"FILE_LIST",
	"CONFIG",
	"TIME",
	"FILE_DATA",
	"STATUS",
] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

const reportTypeSet: ReadonlySet<string> = new Set(REPORT_TYPES);

export function isReportType(value: string | undefined): value is ReportType {
	return value !== undefined && reportTypeSet.has(value);
}

export const DEVICE_DISCONNECTED_STATUS = "disconnected";
