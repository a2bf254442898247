export { EspService } from "./service";
export type { ConnectOptions, EspServiceOptions } from "./service";
export { DeviceSession } from "./session";
export type { SessionHooks } from "./session";
export { CommandRouter } from "./router";
export { DeviceEvents } from "./events";
export type { ConnectionState } from "./events";
export { LineFramer, stripNonPrintable } from "./framer";
export type { FramerOutput } from "./framer";
export {
	bytesToHex,
	decodeFrame,
	encodeCommand,
	encodeRawLine,
	hexToBytes,
	messageType,
} from "./codec";
export type { DecodeResult } from "./codec";
export { SerialPortTransport, signalPolicy } from "./transport";
export type { ModemSignals, SerialTransport, TransportListener } from "./transport";
export { DEFAULT_CONFIG, DEFAULT_SERIAL_SETTINGS, resolveConfig } from "./config";
export type { ConfigOverrides, SerialSettings, SessionConfig } from "./config";
export {
	FLASH_ROOT,
	emptyDeviceConfig,
	formatSyncTime,
	fullPath,
	parseConfig,
	parseFileList,
	parseTimeInfo,
	toWireConfig,
} from "./models";
export type { DeviceConfig, DeviceTimeInfo, DownloadResult, FileSystemEntry, FileSystemEntryKind } from "./models";
export * from "./errors";
export * from "./protocol";
export {
	JOB_DATA_FILE,
	decodePayloadText,
	distinctValues,
	jobRecordToRow,
	parseCsvRows,
	parseJobCsv,
	parseJobLine,
} from "./dataParser";
export type { JobRecord } from "./dataParser";
export { closeLog, initLog } from "./log";
export type { LogSink } from "./log";
