export type TimeSeparator = "," | ".";

export interface Timestamp {
	kind: "time";
	ms: number;
	separator: TimeSeparator;
}

/**
 * A timestamp that did not match `HH:MM:SS,mmm`. It is carried through
 * untouched so that one corrupt cue never aborts a whole file.
 */
export interface RawTime {
	kind: "raw";
	text: string;
}

export type TimeValue = Timestamp | RawTime;

const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d)([,.])(\d{3})$/;

export const TIME_RANGE_PATTERN =
	/(\d{2,}:\d{2}:\d{2}[,.]\d{3})\s*-->\s*(\d{2,}:\d{2}:\d{2}[,.]\d{3})/;

export function parseTimestamp(text: string): TimeValue {
	const trimmed = text.trim();
	const match = trimmed.match(TIMESTAMP_PATTERN);
	if (!match) return { kind: "raw", text: trimmed };

	const hours = parseInt(match[1] ?? "0", 10);
	const minutes = parseInt(match[2] ?? "0", 10);
	const seconds = parseInt(match[3] ?? "0", 10);
	const milliseconds = parseInt(match[5] ?? "0", 10);
	const separator: TimeSeparator = match[4] === "." ? "." : ",";

	return {
		kind: "time",
		ms: hours * 3600000 + minutes * 60000 + seconds * 1000 + milliseconds,
		separator,
	};
}

export function formatTimestamp(ms: number, separator: TimeSeparator = ","): string {
	const total = Math.max(0, Math.round(ms));
	const hours = Math.floor(total / 3600000);
	const minutes = Math.floor((total % 3600000) / 60000);
	const seconds = Math.floor((total % 60000) / 1000);
	const milliseconds = total % 1000;

	const hh = String(hours).padStart(2, "0");
	const mm = String(minutes).padStart(2, "0");
	const ss = String(seconds).padStart(2, "0");
	const mmm = String(milliseconds).padStart(3, "0");

	return `${hh}:${mm}:${ss}${separator}${mmm}`;
}

/**
 * Adds a signed offset in (fractional) seconds. Results below zero are
 * clamped to zero.
 */
export function shift(ms: number, offsetSeconds: number): number {
	return Math.max(0, ms + Math.round(offsetSeconds * 1000));
}

export function shiftTimeValue(value: TimeValue, offsetSeconds: number): TimeValue {
	if (value.kind === "raw") return value;
	return { ...value, ms: shift(value.ms, offsetSeconds) };
}

export function shiftTimestamp(text: string, offsetSeconds: number): string {
	return formatTimeValue(shiftTimeValue(parseTimestamp(text), offsetSeconds));
}

export function formatTimeValue(value: TimeValue): string {
	return value.kind === "raw" ? value.text : formatTimestamp(value.ms, value.separator);
}

export interface TimeRange {
	start: TimeValue;
	end: TimeValue;
	/** Whatever follows the range on its line, such as `X1:40 Y1:20` position tags. */
	settings?: string;
}

export function formatTimeRange(start: TimeValue, end: TimeValue, settings?: string): string {
	const range = `${formatTimeValue(start)} --> ${formatTimeValue(end)}`;
	return settings ? `${range} ${settings}` : range;
}

export function parseTimeRange(line: string): TimeRange | undefined {
	const match = line.match(TIME_RANGE_PATTERN);
	if (!match?.[1] || !match[2]) return undefined;

	const settings = line.slice((match.index ?? 0) + match[0].length).trim();
	return {
		start: parseTimestamp(match[1]),
		end: parseTimestamp(match[2]),
		...(settings.length > 0 && { settings }),
	};
}

export function timeValueToMs(value: TimeValue): number {
	if (value.kind === "raw") {
		throw new Error(`Unparseable timestamp: "${value.text}"`);
	}
	return value.ms;
}
