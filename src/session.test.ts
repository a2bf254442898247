import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeviceReportedError, ProtocolTimeoutError, TransportOpenError, TransportReadError, TransportWriteError } from './errors';
import { type Harness, PORT, connectAndAccept, connectThroughSettle, createHarness } from './testing/harness';

describe('DeviceSession lifecycle', () => {
	let h: Harness;

	beforeEach(() => {
		vi.useFakeTimers();
		h = createHarness();
	});

	afterEach(async () => {
		await h.esp.dispose();
		vi.useRealTimers();
	});

	describe('connect', () => {
		it('should open the port with 115200 8N1 and passive modem lines on linux', async () => {
			await connectThroughSettle(h);

			expect(h.fake.opened).toEqual([
				{ path: PORT, settings: { baudRate: 115200, dataBits: 8, parity: 'none', stopBits: 1 } },
			]);
			expect(h.fake.signals).toEqual({ dtr: false, rts: false });
			expect(h.esp.currentPort).toBe(PORT);
		});

		it('should raise DTR on windows', async () => {
			h = createHarness({ platform: 'win32' });
			await connectThroughSettle(h);

			expect(h.fake.signals).toEqual({ dtr: true, rts: false });
		});

		it('should move to connecting and send the handshake only after the settle delay', async () => {
			const pending = h.esp.connect(PORT);
			await vi.advanceTimersByTimeAsync(999);

			expect(h.esp.state).toBe('connecting');
			expect(h.events.states).toEqual(['connecting']);
			expect(h.esp.statusMessage).toBe(`Connecting to ${PORT}...`);
			expect(h.fake.written).toEqual([]);

			await vi.advanceTimersByTimeAsync(1);

			await expect(pending).resolves.toBe(true);
			expect(h.fake.written).toEqual(['{"type":"HANDSHAKE","device":"esp-serial-link","version":1}\n']);
			expect(h.esp.state).toBe('connecting');
		});

		it('should discard boot noise received during the settle delay', async () => {
			const pending = h.esp.connect(PORT);
			await vi.advanceTimersByTimeAsync(10);
			h.fake.receive('rst:0x1 (POWERON_RESET)\nets Jun  8 2016 partial');
			await vi.advanceTimersByTimeAsync(990);
			await pending;

			h.fake.receive('{"type":"HANDSHAKE","device":"ESP32"}\n');

			expect(h.esp.state).toBe('connected');
			expect(h.esp.output).toEqual([
				'> {"type":"HANDSHAKE","device":"esp-serial-link","version":1}\n',
				'{"type":"HANDSHAKE","device":"ESP32"}\n',
			]);
		});

		it('should hand out a copy of the terminal output', async () => {
			await connectAndAccept(h);
			const before = h.esp.output;
			h.esp.sendRaw('help');

			expect(before).toHaveLength(2);
			expect(h.esp.output).toHaveLength(3);
		});

		it('should report an open failure and stay disconnected', async () => {
			h.fake.failOpenWith = 'Resource busy';

			await expect(h.esp.connect(PORT)).resolves.toBe(false);

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.states).toEqual([]);
			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(TransportOpenError);
			expect(h.events.errors[0].message).toBe(`Failed to open ${PORT}: Resource busy`);
			expect(h.esp.statusMessage).toBe(`Failed to open ${PORT}: Resource busy`);
			expect(h.esp.currentPort).toBeUndefined();
		});

		it('should tear down an existing session before connecting again', async () => {
			await connectAndAccept(h);
			await connectThroughSettle(h);

			expect(h.fake.closeCount).toBe(1);
			expect(h.fake.opened).toHaveLength(2);
			expect(h.events.states).toEqual(['connecting', 'connected', 'disconnected', 'connecting']);
			expect(h.events.errors).toEqual([]);
		});

		it('should give up quietly when disconnected during the settle delay', async () => {
			const pending = h.esp.connect(PORT);
			await vi.advanceTimersByTimeAsync(100);
			await h.esp.disconnect();

			expect(vi.getTimerCount()).toBe(0);
			await expect(pending).resolves.toBe(false);
			expect(h.fake.written).toEqual([]);
			expect(h.esp.state).toBe('disconnected');
		});
	});

	describe('handshake', () => {
		it('should reach connected through connecting with one state change and one operation', async () => {
			await connectThroughSettle(h);
			h.events.states.length = 0;

			h.fake.receiveJson({ type: 'HANDSHAKE', device: 'ESP32' });

			expect(h.esp.state).toBe('connected');
			expect(h.esp.isConnected).toBe(true);
			expect(h.events.states).toEqual(['connected']);
			expect(h.events.operations).toEqual(['Handshake completed: ESP32']);
			expect(h.esp.statusMessage).toBe('Connected');
		});

		it('should treat a repeated handshake as liveness only', async () => {
			await connectAndAccept(h);
			h.fake.receiveJson({ type: 'HANDSHAKE', device: 'ESP32' });

			expect(h.events.states).toEqual(['connecting', 'connected']);
			expect(h.events.operations).toEqual(['Handshake completed: ESP32']);
		});

		it('should ignore a handshake from another kind of device', async () => {
			await connectThroughSettle(h);
			h.fake.receiveJson({ type: 'HANDSHAKE', device: 'ESP8266' });

			expect(h.esp.state).toBe('connecting');
		});

		it('should time out once when the device never answers', async () => {
			await connectThroughSettle(h);
			await vi.advanceTimersByTimeAsync(3999);
			expect(h.esp.state).toBe('connecting');

			await vi.advanceTimersByTimeAsync(1);

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(ProtocolTimeoutError);
			expect(h.events.errors[0].message).toBe('Connection timeout - no response from device');
			expect(h.fake.closeCount).toBe(1);

			await vi.advanceTimersByTimeAsync(60000);
			expect(h.events.errors).toHaveLength(1);
		});
	});

	describe('timers', () => {
		it('should run only the connection timer while connecting', async () => {
			await connectThroughSettle(h);

			expect(vi.getTimerCount()).toBe(1);
		});

		it('should swap the connection timer for the heartbeat once connected', async () => {
			await connectAndAccept(h);

			expect(vi.getTimerCount()).toBe(1);
			await vi.advanceTimersByTimeAsync(5000);
			expect(h.events.errors).toEqual([]);
		});

		it('should clear every timer on disconnect', async () => {
			await connectAndAccept(h);
			await h.esp.disconnect();

			expect(vi.getTimerCount()).toBe(0);
		});
	});

	describe('heartbeat', () => {
		it('should probe every interval while connected', async () => {
			await connectAndAccept(h);
			h.fake.written.length = 0;

			await vi.advanceTimersByTimeAsync(3000);
			expect(h.fake.written).toEqual(['{"type":"PING"}\n']);

			await vi.advanceTimersByTimeAsync(3000);
			expect(h.fake.written).toEqual(['{"type":"PING"}\n', '{"type":"PING"}\n']);
		});

		it('should disconnect once on the first tick past the pong timeout', async () => {
			await connectAndAccept(h);
			h.fake.written.length = 0;

			// Ticks at 3, 6, 9 s still probe; the 12 s tick sees 12 s of silence.
			await vi.advanceTimersByTimeAsync(11999);
			expect(h.esp.state).toBe('connected');
			expect(h.fake.written).toHaveLength(3);

			await vi.advanceTimersByTimeAsync(1);

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(ProtocolTimeoutError);
			expect(h.events.errors[0].message).toBe('Connection lost - no response from device');
			expect(h.fake.written).toHaveLength(3);

			await vi.advanceTimersByTimeAsync(30000);
			expect(h.events.errors).toHaveLength(1);
		});

		it('should stay connected while the device answers PING with PONG', async () => {
			await connectAndAccept(h);

			for (let i = 0; i < 10; i++) {
				await vi.advanceTimersByTimeAsync(3000);
				h.fake.receiveJson({ type: 'PONG' });
			}

			expect(h.esp.state).toBe('connected');
			expect(h.events.errors).toEqual([]);
		});

		it('should count any received message as liveness', async () => {
			await connectAndAccept(h);

			for (let i = 0; i < 5; i++) {
				await vi.advanceTimersByTimeAsync(6000);
				h.fake.receiveJson({ type: 'ACK', cmd: 'PING' });
			}

			expect(h.esp.state).toBe('connected');
		});

		it('should not count undecodable lines as liveness', async () => {
			await connectAndAccept(h);

			for (let i = 0; i < 4; i++) {
				await vi.advanceTimersByTimeAsync(3000);
				h.fake.receive('not json\n');
			}

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors).toHaveLength(1);
		});
	});

	describe('forced disconnects', () => {
		it('should disconnect when the device reports it', async () => {
			await connectAndAccept(h);
			h.fake.receiveJson({ type: 'STATUS', status: 'disconnected' });

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(DeviceReportedError);
			expect(h.events.errors[0].message).toBe('Device reported disconnect');
		});

		it('should ignore a disconnect status while still connecting', async () => {
			await connectThroughSettle(h);
			h.fake.receiveJson({ type: 'STATUS', status: 'disconnected' });

			expect(h.esp.state).toBe('connecting');
			expect(h.events.errors).toEqual([]);
		});

		it('should stop handling lines after a device-side disconnect', async () => {
			await connectAndAccept(h);
			h.fake.receive('{"type":"STATUS","status":"disconnected"}\n{"type":"ACK","cmd":"X"}\n');

			expect(h.events.operations).toEqual(['Handshake completed: ESP32']);
		});

		it('should disconnect on a transport read error', async () => {
			await connectAndAccept(h);
			h.fake.raiseError('Input/output error');

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(TransportReadError);
			expect(h.events.errors[0].message).toBe('Read error: Input/output error');
		});

		it('should disconnect when the adapter is unplugged', async () => {
			await connectAndAccept(h);
			h.fake.unplug();

			expect(h.esp.state).toBe('disconnected');
			expect(h.events.errors.map((err) => err.message)).toEqual(['Read error: port closed']);
		});
	});

	describe('disconnect', () => {
		it('should close the transport without reporting an error', async () => {
			await connectAndAccept(h);
			await h.esp.disconnect();

			expect(h.esp.state).toBe('disconnected');
			expect(h.esp.currentPort).toBeUndefined();
			expect(h.esp.statusMessage).toBe('Disconnected');
			expect(h.fake.isOpen).toBe(false);
			expect(h.fake.listenerCount).toBe(0);
			expect(h.events.errors).toEqual([]);
			expect(h.events.states).toEqual(['connecting', 'connected', 'disconnected']);
		});

		it('should be a no-op when already disconnected', async () => {
			await h.esp.disconnect();
			await h.esp.disconnect();

			expect(h.events.states).toEqual([]);
			expect(h.events.statuses).toEqual([]);
			expect(h.fake.closeCount).toBe(0);
		});

		it('should abort a pending handshake cleanly', async () => {
			await connectThroughSettle(h);
			await h.esp.disconnect();
			await vi.advanceTimersByTimeAsync(10000);

			expect(h.events.errors).toEqual([]);
			expect(h.events.states).toEqual(['connecting', 'disconnected']);
		});
	});

	describe('transmission', () => {
		it('should log outgoing lines with a prefix and incoming text as is', async () => {
			await connectAndAccept(h);
			h.esp.listFiles();

			expect(h.events.rawLog).toEqual([
				'> {"type":"HANDSHAKE","device":"esp-serial-link","version":1}\n',
				'{"type":"HANDSHAKE","device":"ESP32"}\n',
				'> {"type":"LIST_FILES"}\n',
			]);
		});

		it('should report write failures without throwing or disconnecting', async () => {
			await connectAndAccept(h);
			h.fake.failWritesWith = 'EIO';

			expect(() => h.esp.readConfig()).not.toThrow();
			await vi.advanceTimersByTimeAsync(0);

			expect(h.events.errors).toHaveLength(1);
			expect(h.events.errors[0]).toBeInstanceOf(TransportWriteError);
			expect(h.events.errors[0].message).toBe('Write failed: EIO');
			expect(h.esp.state).toBe('connected');
		});

		it('should initialize the device after the handshake when asked', async () => {
			vi.setSystemTime(new Date(Date.UTC(2024, 4, 1, 8, 30, 5)));
			await connectAndAccept(h, true);

			expect(h.fake.written.slice(1)).toEqual([
				'{"type":"SYNC_TIME","time":"2024,5,1,8,30,6"}\n',
				'{"type":"LIST_FILES"}\n',
				'{"type":"READ_CONFIG"}\n',
				'{"type":"GET_SERIAL"}\n',
			]);
		});
	});
});
