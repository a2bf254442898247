/**
 * Parse the job log the logger keeps on flash (Data_jobs.csv)
 * Format: machine,driver,job,date,start,end,duration with one header row
 */
export interface JobRecord {
	machine: string;
	driver: string;
	job: string;
	date: string;
	startTime: string;
	endTime: string;
	duration: string;
}

export const JOB_DATA_FILE = "Data_jobs.csv";

export function parseJobLine(line: string): JobRecord {
	const parts = line.split(",").map((part) => part.trim());
	const column = (idx: number) => parts[idx] ?? "";

	return {
		machine: column(0),
		driver: column(1),
		job: column(2),
		date: column(3),
		startTime: column(4),
		endTime: column(5),
		duration: column(6),
	};
}

export function parseJobCsv(content: string): JobRecord[] {
	const records: JobRecord[] = [];
	const lines = content.split("\n");

	// Skip header line
	for (let i = 1; i < lines.length; i++) {
		const line = lines[i].trim();
		if (line) {
			records.push(parseJobLine(line));
		}
	}

	return records;
}

/**
 * Split every non-empty row into trimmed cells, header included
 */
export function parseCsvRows(content: string): string[][] {
	return content
		.split("\n")
		.map((line) => line.split(",").map((cell) => cell.trim()))
		.filter((row) => row[0] !== "");
}

export function jobRecordToRow(record: JobRecord): string[] {
	return [record.machine, record.driver, record.job, record.date, record.startTime, record.endTime, record.duration];
}

/**
 * Text of a downloaded payload. The firmware writes plain ASCII, anything
 * else is decoded permissively.
 */
export function decodePayloadText(data: Uint8Array): string {
	return new TextDecoder("utf-8", { fatal: false }).decode(data);
}

/**
 * Distinct values of one column, in first-seen order
 */
export function distinctValues(records: JobRecord[], key: keyof JobRecord): string[] {
	const seen = new Set<string>();

	records.forEach((record) => {
		if (record[key]) {
			seen.add(record[key]);
		}
	});

	return Array.from(seen);
}
