export interface FramerOutput {
	/** Complete, trimmed, non-empty lines in arrival order. */
	frames: string[];
	/** Printable part of the chunk, for the terminal log. */
	raw: string;
}

// Keep printable ASCII plus tab/CR/LF. A freshly reset ESP32 prints its ROM
// banner at 74880 baud, which shows up as garbage at 115200.
const NON_PRINTABLE = /[^\x20-\x7E\n\r\t]/g;

export function stripNonPrintable(text: string): string {
	return text.replace(NON_PRINTABLE, "");
}

/**
 * Splits a serial byte stream into newline-delimited text frames.
 * Partial lines are kept until the terminator arrives in a later chunk.
 */
export class LineFramer {
	private decoder = new TextDecoder("utf-8", { fatal: false });
	private buffer = "";

	push(chunk: Uint8Array): FramerOutput {
		const text = this.decoder.decode(chunk, { stream: true });
		this.buffer += text;

		const frames: string[] = [];
		let idx = this.buffer.indexOf("\n");
		while (idx !== -1) {
			const line = this.buffer.substring(0, idx).trim();
			this.buffer = this.buffer.substring(idx + 1);
			if (line) {
				frames.push(line);
			}
			idx = this.buffer.indexOf("\n");
		}

		return { frames, raw: stripNonPrintable(text) };
	}

	/** Bytes received but not yet terminated by a newline. */
	get pending(): string {
		return this.buffer;
	}

	reset() {
		this.buffer = "";
		this.decoder = new TextDecoder("utf-8", { fatal: false });
	}
}
