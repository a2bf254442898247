import { Observable, Subject } from "rxjs";
import type { EspLinkError } from "./errors";
import type { DeviceConfig, DeviceTimeInfo, DownloadResult, FileSystemEntry } from "./models";
import type { WireMessage } from "./protocol";

export type ConnectionState = "disconnected" | "connecting" | "connected";

/**
 * One channel per event kind. Publishing is internal to the library;
 * collaborators get the read-only `Observable` side.
 */
export class DeviceEvents {
	private readonly stateSubject = new Subject<ConnectionState>();
	private readonly statusSubject = new Subject<string>();
	private readonly errorSubject = new Subject<EspLinkError>();
	private readonly operationSubject = new Subject<string>();
	private readonly messageSubject = new Subject<WireMessage>();
	private readonly fileListSubject = new Subject<FileSystemEntry[]>();
	private readonly configSubject = new Subject<DeviceConfig>();
	private readonly timeSubject = new Subject<DeviceTimeInfo>();
	private readonly serialNumberSubject = new Subject<string>();
	private readonly downloadSubject = new Subject<DownloadResult>();
	private readonly rawLogSubject = new Subject<string>();

	readonly state$: Observable<ConnectionState> = this.stateSubject.asObservable();
	readonly status$: Observable<string> = this.statusSubject.asObservable();
	readonly error$: Observable<EspLinkError> = this.errorSubject.asObservable();
	/** Successful operations: handshake, ACKs, completed downloads. */
	readonly operation$: Observable<string> = this.operationSubject.asObservable();
	/** Every decoded message, whatever its type. */
	readonly message$: Observable<WireMessage> = this.messageSubject.asObservable();
	readonly fileList$: Observable<FileSystemEntry[]> = this.fileListSubject.asObservable();
	readonly config$: Observable<DeviceConfig> = this.configSubject.asObservable();
	readonly time$: Observable<DeviceTimeInfo> = this.timeSubject.asObservable();
	readonly serialNumber$: Observable<string> = this.serialNumberSubject.asObservable();
	readonly download$: Observable<DownloadResult> = this.downloadSubject.asObservable();
	/** Terminal view: printable incoming text and "> "-prefixed outgoing lines. */
	readonly rawLog$: Observable<string> = this.rawLogSubject.asObservable();

	state(value: ConnectionState) {
		this.stateSubject.next(value);
	}

	status(message: string) {
		this.statusSubject.next(message);
	}

	error(err: EspLinkError) {
		this.errorSubject.next(err);
	}

	operation(message: string) {
		this.operationSubject.next(message);
	}

	message(message: WireMessage) {
		this.messageSubject.next(message);
	}

	fileList(entries: FileSystemEntry[]) {
		this.fileListSubject.next(entries);
	}

	config(config: DeviceConfig) {
		this.configSubject.next(config);
	}

	time(info: DeviceTimeInfo) {
		this.timeSubject.next(info);
	}

	serialNumber(serial: string) {
		this.serialNumberSubject.next(serial);
	}

	download(result: DownloadResult) {
		this.downloadSubject.next(result);
	}

	rawLog(line: string) {
		this.rawLogSubject.next(line);
	}

	complete() {
		for (const subject of [
			this.stateSubject,
			this.statusSubject,
			this.errorSubject,
			this.operationSubject,
			this.messageSubject,
			this.fileListSubject,
			this.configSubject,
			this.timeSubject,
			this.serialNumberSubject,
			this.downloadSubject,
			this.rawLogSubject,
		]) {
			subject.complete();
		}
	}
}
