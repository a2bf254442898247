import { bytesToHex, hexToBytes, messageType, readString } from "./codec";
import { DeviceReportedError, EspLinkError, HexDecodeError, describeError } from "./errors";
import type { DeviceEvents } from "./events";
import { info } from "./log";
import { type DeviceConfig, formatSyncTime, parseConfig, parseFileList, parseTimeInfo, toWireConfig } from "./models";
import { DEVICE_DISCONNECTED_STATUS, type WireMessage, isReportType } from "./protocol";
import type { DeviceSession } from "./session";

/**
 * Outbound commands and inbound dispatch. Every command is fire-and-forget:
 * replies show up on the event channels, and nothing is sent (or thrown)
 * while the port is closed.
 */
export class CommandRouter {
	// Only one download can be outstanding; a second request replaces the first.
	private pendingDownload: string | undefined;
	private _lastDownloadedData: Uint8Array | undefined;

	constructor(
		private readonly session: DeviceSession,
		private readonly events: DeviceEvents,
		private readonly expectedDevice: string,
	) {}

	get pendingDownloadToken(): string | undefined {
		return this.pendingDownload;
	}

	get lastDownloadedData(): Uint8Array | undefined {
		return this._lastDownloadedData;
	}

	clearPendingDownload() {
		this.pendingDownload = undefined;
	}

	sendPing() {
		this.session.send({ type: "PING" });
	}

	listFiles() {
		this.session.send({ type: "LIST_FILES" });
	}

	uploadFile(remoteFilename: string, data: Uint8Array) {
		this.session.send({ type: "UPLOAD_FILE", filename: remoteFilename, hexdata: bytesToHex(data) });
	}

	/** `token` comes back with the data on the download channel, e.g. a local save path. */
	downloadFile(remoteFilename: string, token: string) {
		if (!this.session.isOpen) return;
		this.pendingDownload = token;
		this.session.send({ type: "DOWNLOAD_FILE", filename: remoteFilename });
	}

	deleteFile(remoteFilename: string) {
		this.session.send({ type: "DELETE_FILE", filename: remoteFilename });
	}

	readConfig() {
		this.session.send({ type: "READ_CONFIG" });
	}

	writeConfig(config: DeviceConfig) {
		this.session.send({ type: "WRITE_CONFIG", config: toWireConfig(config) });
	}

	getBoardSerial() {
		this.session.send({ type: "GET_SERIAL" });
	}

	fetchDeviceTime() {
		this.session.send({ type: "FETCH_TIME" });
	}

	syncTime(date: Date, utc = false) {
		this.session.send({ type: "SYNC_TIME", time: formatSyncTime(date, utc) });
	}

	/** Truncates a CSV on the device, keeping its header row. */
	clearDataFile(remoteFilename: string) {
		this.session.send({ type: "CLEAR_CSV", filename: remoteFilename });
	}

	sendRaw(text: string) {
		this.session.sendRaw(text);
	}

	/** Syncs the RTC to UTC and requests files, config and serial. */
	initializeDevice(now: Date = new Date()) {
		if (!this.session.isConnected) return;
		info(`Initializing device, syncing UTC time ${now.toISOString()}`);
		this.syncTime(now, true);
		this.listFiles();
		this.readConfig();
		this.getBoardSerial();
	}

	dispatch(message: WireMessage) {
		this.events.message(message);

		const type = messageType(message);
		if (!isReportType(type)) {
			info(`[RX] Ignoring message type ${type ?? "(none)"}`);
			return;
		}

		switch (type) {
			case "HANDSHAKE": {
				const device = readString(message, "device");
				if (device === this.expectedDevice) {
					this.session.acceptHandshake(device);
				}
				break;
			}
			case "PONG":
				this.session.markAlive();
				break;
			case "ACK":
				this.events.operation(`ACK: ${readString(message, "cmd")}`);
				break;
			case "NAK": {
				const cmd = readString(message, "cmd");
				this.events.error(new DeviceReportedError(`NAK: ${cmd} (${readString(message, "error_msg")})`, cmd));
				break;
			}
			case "ERROR":
				this.events.error(new DeviceReportedError(`Device error: ${readString(message, "error_msg")}`));
				break;
			case "SERIAL":
				this.events.serialNumber(readString(message, "serial"));
				this.session.setStatus("Board serial received");
				break;
			case "FILE_LIST":
				this.events.fileList(parseFileList(message));
				this.session.setStatus("File list updated");
				break;
			case "CONFIG":
				this.events.config(parseConfig(message));
				this.session.setStatus("Configuration loaded");
				break;
			case "TIME":
				this.events.time(parseTimeInfo(message));
				this.session.setStatus("Device time updated");
				break;
			case "FILE_DATA":
				this.completeDownload(readString(message, "hexdata"));
				break;
			case "STATUS":
				if (readString(message, "status") === DEVICE_DISCONNECTED_STATUS && this.session.isConnected) {
					this.session.fail(new DeviceReportedError("Device reported disconnect"));
				}
				break;
		}
	}

	private completeDownload(hexdata: string) {
		const token = this.pendingDownload;
		if (token === undefined || hexdata === "") return;

		let data: Uint8Array;
		try {
			data = hexToBytes(hexdata);
		} catch (err) {
			// The request stays pending; the device may resend.
			this.events.error(err instanceof EspLinkError ? err : new HexDecodeError(describeError(err)));
			return;
		}

		this.pendingDownload = undefined;
		this._lastDownloadedData = data;
		this.events.download({ token, data });
		this.events.operation(`File downloaded: ${token}`);
	}
}
