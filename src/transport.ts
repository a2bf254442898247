import { SerialPort } from "serialport";
import type { SerialSettings } from "./config";
import { TransportOpenError, TransportWriteError, describeError } from "./errors";
import { info } from "./log";

export interface ModemSignals {
	dtr: boolean;
	rts: boolean;
}

export interface TransportListener {
	data(chunk: Uint8Array): void;
	error(err: Error): void;
	/** The port went away without `close()` being called. */
	close(): void;
}

/**
 * Byte-stream boundary around the physical port. Enumeration of ports is
 * left to the caller.
 */
export interface SerialTransport {
	readonly isOpen: boolean;
	open(path: string, settings: SerialSettings): Promise<void>;
	setSignals(signals: ModemSignals): Promise<void>;
	write(data: Uint8Array): Promise<void>;
	close(): Promise<void>;
	/** Returns a function that stops delivery to this listener. */
	subscribe(listener: TransportListener): () => void;
}

/**
 * Toggling DTR resets most ESP32 boards, so POSIX hosts leave both lines
 * low. On Windows DTR is raised and the firmware treats it as "host present".
 */
export function signalPolicy(platform: NodeJS.Platform): ModemSignals {
	return platform === "win32" ? { dtr: true, rts: false } : { dtr: false, rts: false };
}

export class SerialPortTransport implements SerialTransport {
	private port: SerialPort | undefined;
	private readonly listeners = new Set<TransportListener>();
	// Bumped by every open() and close(); an open that finishes under a newer value lost the race.
	private attempt = 0;

	get isOpen(): boolean {
		return this.port?.isOpen ?? false;
	}

	async open(path: string, settings: SerialSettings): Promise<void> {
		await this.close();
		const attempt = ++this.attempt;

		const port = new SerialPort({
			path,
			baudRate: settings.baudRate,
			dataBits: settings.dataBits,
			parity: settings.parity,
			stopBits: settings.stopBits,
			autoOpen: false,
		});

		await new Promise<void>((resolve, reject) => {
			port.open((err) => {
				if (err) {
					port.removeAllListeners();
					reject(new TransportOpenError(path, err.message, { cause: err }));
					return;
				}
				resolve();
			});
		});

		if (attempt !== this.attempt) {
			await closePort(port);
			throw new TransportOpenError(path, "superseded by a later open or close");
		}

		port.on("data", (chunk: Buffer) => {
			for (const listener of this.listeners) listener.data(chunk);
		});
		port.on("error", (err: Error) => {
			info(`Port error on ${path}: ${err.message}`);
			for (const listener of this.listeners) listener.error(err);
		});
		port.on("close", () => {
			// close() detaches the port first, so only unexpected closes get here.
			if (this.port !== port) return;
			info(`Port ${path} closed unexpectedly`);
			this.port = undefined;
			for (const listener of this.listeners) listener.close();
		});

		this.port = port;
		info(`Opened ${path} at ${settings.baudRate} baud`);
	}

	async setSignals(signals: ModemSignals): Promise<void> {
		const port = this.port;
		if (!port) return;
		await new Promise<void>((resolve, reject) => {
			port.set({ dtr: signals.dtr, rts: signals.rts }, (err) => {
				if (err) {
					reject(err);
					return;
				}
				resolve();
			});
		});
	}

	async write(data: Uint8Array): Promise<void> {
		const port = this.port;
		if (!port || !port.isOpen) {
			throw new TransportWriteError("port not open");
		}
		await new Promise<void>((resolve, reject) => {
			port.write(Buffer.from(data), (err) => {
				if (err) {
					reject(new TransportWriteError(err.message, { cause: err }));
					return;
				}
				resolve();
			});
		});
	}

	/** Closes the current port and abandons any open() still in flight. */
	async close(): Promise<void> {
		this.attempt++;
		const port = this.port;
		this.port = undefined;
		if (!port) return;
		await closePort(port);
	}

	subscribe(listener: TransportListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}

async function closePort(port: SerialPort): Promise<void> {
	try {
		if (port.isOpen) {
			await new Promise<void>((resolve, reject) => {
				port.close((err) => {
					if (err) {
						reject(err);
						return;
					}
					resolve();
				});
			});
		}
	} catch (err) {
		info(`Error closing port: ${describeError(err)}`);
	} finally {
		port.removeAllListeners();
	}
}
