import type { Observable } from "rxjs";
import { type ConfigOverrides, type SessionConfig, resolveConfig } from "./config";
import type { EspLinkError } from "./errors";
import { type ConnectionState, DeviceEvents } from "./events";
import { info } from "./log";
import type { DeviceConfig, DeviceTimeInfo, DownloadResult, FileSystemEntry } from "./models";
import type { WireMessage } from "./protocol";
import { CommandRouter } from "./router";
import { DeviceSession } from "./session";
import { type SerialTransport, SerialPortTransport } from "./transport";

export interface EspServiceOptions {
	transport?: SerialTransport;
	config?: ConfigOverrides;
	env?: Record<string, string | undefined>;
}

export interface ConnectOptions {
	/** Sync the clock and request files, config and serial once connected. */
	initialize?: boolean;
}

/**
 * The shared connection object. Create one per process and hand it to every
 * part of the application that talks to the device.
 *
 * Usage:
 *   const esp = new EspService();
 *   esp.state$.subscribe((state) => ...);
 *   await esp.connect("/dev/ttyUSB0", { initialize: true });
 *   esp.downloadFile("Data_jobs.csv", "./jobs.csv");
 *   await esp.disconnect();
 */
export class EspService {
	readonly config: SessionConfig;
	private readonly events = new DeviceEvents();
	private readonly session: DeviceSession;
	private readonly router: CommandRouter;
	private initializeOnConnect = false;

	constructor(options: EspServiceOptions = {}) {
		this.config = resolveConfig(options.config, options.env);
		this.session = new DeviceSession(options.transport ?? new SerialPortTransport(), this.events, this.config, {
			message: (message) => this.router.dispatch(message),
			connected: () => {
				if (this.initializeOnConnect) {
					this.router.initializeDevice();
				}
			},
			closed: () => this.router.clearPendingDownload(),
		});
		this.router = new CommandRouter(this.session, this.events, this.config.expectedDevice);
	}

	get state$(): Observable<ConnectionState> {
		return this.events.state$;
	}

	get status$(): Observable<string> {
		return this.events.status$;
	}

	get error$(): Observable<EspLinkError> {
		return this.events.error$;
	}

	get operation$(): Observable<string> {
		return this.events.operation$;
	}

	get message$(): Observable<WireMessage> {
		return this.events.message$;
	}

	get fileList$(): Observable<FileSystemEntry[]> {
		return this.events.fileList$;
	}

	get config$(): Observable<DeviceConfig> {
		return this.events.config$;
	}

	get time$(): Observable<DeviceTimeInfo> {
		return this.events.time$;
	}

	get serialNumber$(): Observable<string> {
		return this.events.serialNumber$;
	}

	get download$(): Observable<DownloadResult> {
		return this.events.download$;
	}

	get rawLog$(): Observable<string> {
		return this.events.rawLog$;
	}

	get state(): ConnectionState {
		return this.session.state;
	}

	get isConnected(): boolean {
		return this.session.isConnected;
	}

	get currentPort(): string | undefined {
		return this.session.currentPort;
	}

	get statusMessage(): string {
		return this.session.statusMessage;
	}

	/** Terminal history, oldest first. */
	get output(): readonly string[] {
		return this.session.output;
	}

	get lastDownloadedData(): Uint8Array | undefined {
		return this.router.lastDownloadedData;
	}

	/** No automatic reconnect happens anywhere; call this again to retry. */
	async connect(path: string, options: ConnectOptions = {}): Promise<boolean> {
		this.initializeOnConnect = options.initialize ?? false;
		return this.session.connect(path);
	}

	async disconnect(): Promise<void> {
		await this.session.disconnect();
	}

	initializeDevice(now?: Date) {
		this.router.initializeDevice(now);
	}

	sendPing() {
		this.router.sendPing();
	}

	listFiles() {
		this.router.listFiles();
	}

	uploadFile(remoteFilename: string, data: Uint8Array) {
		this.router.uploadFile(remoteFilename, data);
	}

	downloadFile(remoteFilename: string, token: string) {
		this.router.downloadFile(remoteFilename, token);
	}

	deleteFile(remoteFilename: string) {
		this.router.deleteFile(remoteFilename);
	}

	readConfig() {
		this.router.readConfig();
	}

	writeConfig(config: DeviceConfig) {
		this.router.writeConfig(config);
	}

	getBoardSerial() {
		this.router.getBoardSerial();
	}

	fetchDeviceTime() {
		this.router.fetchDeviceTime();
	}

	syncTime(date: Date) {
		this.router.syncTime(date);
	}

	clearDataFile(remoteFilename: string) {
		this.router.clearDataFile(remoteFilename);
	}

	sendRaw(text: string) {
		this.router.sendRaw(text);
	}

	/** Disconnects and completes every event channel. */
	async dispose(): Promise<void> {
		info("Disposing service - cleaning up resources");
		await this.session.disconnect();
		this.events.complete();
	}
}
