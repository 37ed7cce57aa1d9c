import type { DateValue, ParsedValue, TimeValue } from "./types";

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

function formatOffset(offset: number | null): string {
	if (offset === null) return "";
	if (offset === 0) return "Z";
	const sign = offset < 0 ? "-" : "+";
	const minutes = Math.abs(offset);
	return `${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
}

function formatDate(value: Omit<DateValue, "kind">): string {
	return `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}`;
}

function formatTime(value: Omit<TimeValue, "kind">): string {
	const fraction = value.microsecond === 0 ? "" : `.${pad(value.microsecond, 6)}`;
	return `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}${fraction}${formatOffset(value.offset)}`;
}

/** Render a parsed value in ISO 8601 extended format. */
export function formatIso(value: ParsedValue): string {
	switch (value.kind) {
		case "date":
			return formatDate(value);
		case "time":
			return formatTime(value);
		case "datetime":
			return `${formatDate(value)}T${formatTime(value)}`;
	}
}
