import { decodeFrame, encodeCommand, encodeRawLine } from "./codec";
import type { SessionConfig } from "./config";
import {
	EspLinkError,
	ProtocolTimeoutError,
	TransportOpenError,
	TransportReadError,
	TransportWriteError,
	describeError,
} from "./errors";
import type { ConnectionState, DeviceEvents } from "./events";
import { LineFramer } from "./framer";
import { error, info } from "./log";
import type { DeviceCommand, WireMessage } from "./protocol";
import { type SerialTransport, signalPolicy } from "./transport";

export interface SessionHooks {
	/** A decoded message; liveness has already been refreshed. */
	message(message: WireMessage): void;
	/** The handshake was accepted. */
	connected(): void;
	/** The session was torn down, for whatever reason. */
	closed(): void;
}

const MAX_OUTPUT_LINES = 1000;

/**
 * Connection lifecycle for one device: open, settle, handshake, heartbeat,
 * teardown. All state lives here and is only touched from event-loop
 * callbacks (transport data, the two timers, caller commands).
 */
export class DeviceSession {
	private _state: ConnectionState = "disconnected";
	private _currentPort: string | undefined;
	private _statusMessage = "Ready";
	private readonly _output: string[] = [];

	private readonly framer = new LineFramer();
	private lastLiveness = 0;
	private connectionTimer: ReturnType<typeof setTimeout> | undefined;
	private heartbeatTimer: ReturnType<typeof setInterval> | undefined;
	private settle: { timer: ReturnType<typeof setTimeout>; resolve: () => void } | undefined;
	private unsubscribe: (() => void) | undefined;
	// Bumped on every teardown so an in-flight connect() notices it was cancelled.
	private generation = 0;
	// Generation of the connect() still waiting on transport.open().
	private opening: number | undefined;

	constructor(
		private readonly transport: SerialTransport,
		private readonly events: DeviceEvents,
		private readonly config: SessionConfig,
		private readonly hooks: SessionHooks,
	) {}

	get state(): ConnectionState {
		return this._state;
	}

	get isConnected(): boolean {
		return this._state === "connected";
	}

	get isOpen(): boolean {
		return this.transport.isOpen;
	}

	get currentPort(): string | undefined {
		return this._currentPort;
	}

	get statusMessage(): string {
		return this._statusMessage;
	}

	get output(): readonly string[] {
		return [...this._output];
	}

	/**
	 * Opens the port and sends the handshake. Resolves once the handshake is
	 * on the wire; acceptance arrives later on the state channel. Resolves
	 * `false` if the port cannot be opened or the attempt was cancelled.
	 */
	async connect(path: string): Promise<boolean> {
		if (this._state !== "disconnected" || this.transport.isOpen || this.opening !== undefined) {
			await this.disconnect();
		}
		const generation = ++this.generation;
		this.opening = generation;

		try {
			await this.transport.open(path, this.config.serial);
		} catch (err) {
			// A later connect() or disconnect() abandoned this open.
			if (generation !== this.generation) return false;
			this.opening = undefined;
			const failure = err instanceof EspLinkError ? err : new TransportOpenError(path, describeError(err), { cause: err });
			error(failure.message);
			this.setStatus(failure.message);
			this.events.error(failure);
			return false;
		}
		// Whoever bumped the generation has already closed this port.
		if (generation !== this.generation) return false;
		this.opening = undefined;

		try {
			await this.transport.setSignals(signalPolicy(this.config.platform));
		} catch (err) {
			info(`Failed to set modem signals: ${describeError(err)}`);
		}
		if (generation !== this.generation) return false;

		this.framer.reset();
		this._output.length = 0;
		this._currentPort = path;
		this.setState("connecting");
		this.setStatus(`Connecting to ${path}...`);

		this.clearConnectionTimer();
		this.connectionTimer = setTimeout(() => this.onConnectionTimeout(), this.config.connectionTimeoutMs);

		this.unsubscribe = this.transport.subscribe({
			data: (chunk) => this.receive(chunk),
			error: (err) => this.fail(new TransportReadError(err.message, { cause: err })),
			close: () => this.fail(new TransportReadError("port closed")),
		});

		// The ROM bootloader talks at a different baud rate after reset; drop it.
		await this.waitForSettle();
		if (generation !== this.generation) {
			return false;
		}
		this.framer.reset();
		this._output.length = 0;

		this.send({ type: "HANDSHAKE", device: this.config.clientId, version: this.config.protocolVersion });
		return true;
	}

	/** Full teardown. Safe in any state, including mid-handshake. */
	async disconnect(): Promise<void> {
		const opening = this.opening !== undefined;
		this.opening = undefined;
		this.generation++;
		this.clearConnectionTimer();
		this.clearHeartbeatTimer();
		this.cancelSettle();
		this.unsubscribe?.();
		this.unsubscribe = undefined;
		this.framer.reset();
		this._currentPort = undefined;
		this.hooks.closed();
		if (this._state === "disconnected" && !this.transport.isOpen) {
			// The transport drops the port of an open that is still in flight.
			if (opening) await this.transport.close();
			return;
		}

		this.setState("disconnected");
		this.setStatus("Disconnected");

		await this.transport.close();
	}

	/** Handshake acceptance from the device. Repeated acceptance only refreshes liveness. */
	acceptHandshake(device: string) {
		this.markAlive();
		if (this._state !== "connecting") return;

		info(`Handshake accepted from ${device}`);
		this.clearConnectionTimer();
		this.setState("connected");
		this.startHeartbeat();
		this.setStatus("Connected");
		this.events.operation(`Handshake completed: ${device}`);
		this.hooks.connected();
	}

	markAlive() {
		this.lastLiveness = Date.now();
	}

	/** Reports a connection-level failure once and tears the session down. */
	fail(err: EspLinkError) {
		if (this._state === "disconnected") return;
		error(err.message);
		this.events.error(err);
		this.disconnect().catch((closeErr: unknown) => {
			error(`Teardown after failure did not complete: ${describeError(closeErr)}`);
		});
	}

	setStatus(message: string) {
		this._statusMessage = message;
		this.events.status(message);
	}

	send(command: DeviceCommand) {
		this.transmit(encodeCommand(command));
	}

	sendRaw(text: string) {
		this.transmit(encodeRawLine(text));
	}

	private transmit(bytes: Uint8Array) {
		if (!this.transport.isOpen) return;

		const line = Buffer.from(bytes).toString("utf8");
		info(`[SERIAL OUT] ${line.trimEnd()}`);
		this.appendOutput(`> ${line}`);

		this.transport.write(bytes).catch((err: unknown) => {
			const failure = err instanceof EspLinkError ? err : new TransportWriteError(describeError(err), { cause: err });
			error(failure.message);
			this.events.error(failure);
		});
	}

	private receive(chunk: Uint8Array) {
		const generation = this.generation;
		const { frames, raw } = this.framer.push(chunk);
		if (raw) {
			this.appendOutput(raw);
		}

		for (const frame of frames) {
			info(`[RX] ${frame}`);
			const result = decodeFrame(frame);
			if (!result.ok) {
				info(`[RX] ${result.error.message}`);
				continue;
			}
			this.markAlive();
			this.hooks.message(result.message);
			// A message can end the session (device-side disconnect).
			if (generation !== this.generation) break;
		}
	}

	private appendOutput(line: string) {
		if (this._output.length >= MAX_OUTPUT_LINES) {
			this._output.shift();
		}
		this._output.push(line);
		this.events.rawLog(line);
	}

	private setState(next: ConnectionState) {
		if (this._state === next) return;
		this._state = next;
		this.events.state(next);
	}

	private onConnectionTimeout() {
		this.connectionTimer = undefined;
		if (this._state !== "connecting") return;
		this.fail(new ProtocolTimeoutError("handshake", "Connection timeout - no response from device"));
	}

	private startHeartbeat() {
		this.clearHeartbeatTimer();
		this.heartbeatTimer = setInterval(() => this.onHeartbeat(), this.config.heartbeatIntervalMs);
	}

	private onHeartbeat() {
		if (this._state !== "connected") return;

		const elapsed = Date.now() - this.lastLiveness;
		if (elapsed > this.config.pongTimeoutMs) {
			info(`[Heartbeat] no reply for ${elapsed} ms, disconnecting`);
			this.fail(new ProtocolTimeoutError("heartbeat", "Connection lost - no response from device"));
			return;
		}
		this.send({ type: "PING" });
	}

	private waitForSettle(): Promise<void> {
		return new Promise<void>((resolve) => {
			const timer = setTimeout(() => {
				this.settle = undefined;
				resolve();
			}, this.config.settleDelayMs);
			this.settle = { timer, resolve };
		});
	}

	/** Stops the settle wait early; the waiting connect() then sees the bumped generation. */
	private cancelSettle() {
		if (!this.settle) return;
		const { timer, resolve } = this.settle;
		this.settle = undefined;
		clearTimeout(timer);
		resolve();
	}

	private clearConnectionTimer() {
		if (this.connectionTimer) {
			clearTimeout(this.connectionTimer);
			this.connectionTimer = undefined;
		}
	}

	private clearHeartbeatTimer() {
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = undefined;
		}
	}
}
