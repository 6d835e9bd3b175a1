import Papa from "papaparse";
import type { ParseError } from "papaparse";
import { MalformedSourceError } from "./errors";
import {
	AI_THEME_FIELD,
	ALBUM_FIELD,
	ANNOTATION_FAILURE_MARKERS,
	type FieldValue,
	MOOD_PREFIX,
	PLACEHOLDER,
	REQUIRED_ANNOTATION_FIELDS,
	type SongRecord,
	type SongTable,
	TRACK_FIELD,
	isMissing,
} from "./types";

export const DEFAULT_NUMERIC_FIELDS: ReadonlyArray<string> = [
	"danceability",
	"key_key",
	"key_strength",
	"bpm",
	"loudness",
];

const MISSING_TOKENS: ReadonlySet<string> = new Set([
	"",
	"NA",
	"N/A",
	"n/a",
	"NaN",
	"nan",
	"-NaN",
	"null",
	"NULL",
	"None",
	"#N/A",
	"<NA>",
]);

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export type NormalizeOptions = {
	/** Named numeric columns. Every `mood_*` column is numeric regardless. */
	numericFields?: ReadonlyArray<string>;
};

export type ParsedSongCsv = Readonly<{
	table: SongTable;
	warnings: ReadonlyArray<string>;
}>;

export function toNumber(value: unknown): number | null {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value !== "string") return null;
	const trimmed = value.trim();
	if (!DECIMAL_PATTERN.test(trimmed)) return null;
	const parsed = Number.parseFloat(trimmed);
	return Number.isFinite(parsed) ? parsed : null;
}

function toText(value: unknown): string | null {
	if (typeof value !== "string") return null;
	return MISSING_TOKENS.has(value) ? null : value;
}

export function isAnnotated(theme: FieldValue | undefined): boolean {
	if (isMissing(theme)) return false;
	return !ANNOTATION_FAILURE_MARKERS.has(String(theme));
}

export function createDisplayLabel(fields: Readonly<Record<string, FieldValue>>): string {
	const track = fields[TRACK_FIELD];
	const album = fields[ALBUM_FIELD];
	const trackText = isMissing(track) ? PLACEHOLDER : String(track);
	const albumText = isMissing(album) ? PLACEHOLDER : String(album);
	return `${trackText} | ${albumText}`;
}

export function numericColumnsOf(
	columns: ReadonlyArray<string>,
	numericFields: ReadonlyArray<string> = DEFAULT_NUMERIC_FIELDS,
): Set<string> {
	const wanted = new Set(numericFields);
	return new Set(columns.filter((column) => wanted.has(column) || column.startsWith(MOOD_PREFIX)));
}

export function hasAnnotationColumns(columns: ReadonlyArray<string>): boolean {
	return REQUIRED_ANNOTATION_FIELDS.every((field) => columns.includes(field));
}

function describeParseError(error: ParseError): string {
	const row = error.row === undefined ? "" : ` (data row ${error.row + 1})`;
	return `${error.message}${row}`;
}

function isFatal(error: ParseError): boolean {
	return error.type === "Quotes" || error.code === "TooManyFields";
}

/**
 * Build the normalized table from raw rows. Values in numeric columns become
 * finite numbers or `null`; all other values stay strings or `null`.
 */
export function normalizeRows(
	columns: ReadonlyArray<string>,
	rows: ReadonlyArray<Readonly<Record<string, unknown>>>,
	options: NormalizeOptions = {},
): SongTable {
	const numeric = numericColumnsOf(columns, options.numericFields);
	const annotationsAvailable = hasAnnotationColumns(columns);

	const records: SongRecord[] = rows.map((row, index) => {
		const fields: Record<string, FieldValue> = {};
		for (const column of columns) {
			const raw = row[column];
			fields[column] = numeric.has(column) ? toNumber(raw) : toText(raw);
		}
		return {
			index,
			fields,
			hasAnnotation: annotationsAvailable && isAnnotated(fields[AI_THEME_FIELD]),
			displayLabel: createDisplayLabel(fields),
		};
	});

	return { columns: [...columns], records, annotationsAvailable };
}

export function parseSongCsv(text: string, options: NormalizeOptions = {}): ParsedSongCsv {
	const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
	if (input.trim().length === 0) {
		throw new MalformedSourceError("Dataset file is empty: expected a header row");
	}

	const parsed = Papa.parse<Record<string, unknown>>(input, {
		header: true,
		delimiter: ",",
		skipEmptyLines: true,
	});

	const fatal = parsed.errors.find(isFatal);
	if (fatal) {
		throw new MalformedSourceError(`Unable to parse dataset: ${describeParseError(fatal)}`, fatal.row);
	}

	const columns = parsed.meta.fields ?? [];
	if (columns.length === 0) {
		throw new MalformedSourceError("Dataset file has no header row");
	}

	return {
		table: normalizeRows(columns, parsed.data, options),
		warnings: parsed.errors.map(describeParseError),
	};
}
