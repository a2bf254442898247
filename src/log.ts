export type LogSink = (line: string) => void;

const PREFIX = "[esp-serial-link]";

let sink: LogSink | undefined;

/**
 * Route library output to a sink. Until this is called nothing is written,
 * so an embedding application decides whether the serial traffic is visible.
 */
export function initLog(target: LogSink = (line) => console.log(line)) {
	sink = target;
}

export function closeLog() {
	sink = undefined;
}

export function info(message: string) {
	sink?.(`${PREFIX} ${new Date().toISOString()} ${message}`);
}

export function error(message: string) {
	sink?.(`${PREFIX} ${new Date().toISOString()} ERROR ${message}`);
}
