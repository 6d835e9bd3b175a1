import type { DashboardContext } from "./context";
import { StaleSelectionError } from "./errors";
import {
	AI_NOTES_FIELD,
	AI_SENTIMENT_CATEGORY_FIELD,
	AI_SENTIMENT_FIELD,
	AI_THEME_FIELD,
	ALBUM_FIELD,
	CREDIT_COLUMNS,
	type CreditRole,
	type FieldValue,
	LYRICS_FIELD,
	PLACEHOLDER,
	type SongRecord,
	TRACK_FIELD,
	isMissing,
} from "./types";

export type Resolution = Readonly<{
	record: SongRecord;
	/** How many records share the label; only the first is shown. */
	matchCount: number;
}>;

export type AnnotationBlock = Readonly<{
	theme: string;
	sentimentCategory: string;
	sentiment: string;
	notes: string;
}>;

export type CreditLine = Readonly<{
	role: CreditRole;
	label: string;
	value: string;
}>;

export type DetailField = Readonly<{
	field: string;
	value: string | number;
}>;

export type SongDetail = Readonly<{
	label: string;
	title: string;
	album: string;
	lyrics: string | null;
	annotation: AnnotationBlock | null;
	credits: ReadonlyArray<CreditLine>;
	otherFields: ReadonlyArray<DetailField>;
	matchCount: number;
}>;

/** Columns shown in dedicated sections, never in the catch-all list. */
export const DETAIL_EXCLUDED_FIELDS: ReadonlySet<string> = new Set([
	TRACK_FIELD,
	ALBUM_FIELD,
	LYRICS_FIELD,
	AI_THEME_FIELD,
	AI_SENTIMENT_FIELD,
	AI_SENTIMENT_CATEGORY_FIELD,
	AI_NOTES_FIELD,
	...CREDIT_COLUMNS.flatMap((credit) => credit.columns),
]);

function text(value: FieldValue | undefined): string {
	return isMissing(value) ? PLACEHOLDER : String(value);
}

/**
 * Finds the record for a display label. Labels are not guaranteed unique;
 * the first record in file order wins so repeated lookups agree.
 */
export function resolveSelection(context: DashboardContext, label: string): Resolution {
	const matches = context.table.records.filter((record) => record.displayLabel === label);
	const [first] = matches;
	if (!first) {
		throw new StaleSelectionError(label);
	}
	return { record: first, matchCount: matches.length };
}

function creditValue(record: SongRecord, columns: ReadonlyArray<string>): string {
	for (const column of columns) {
		const value = record.fields[column];
		if (!isMissing(value)) return String(value);
	}
	return PLACEHOLDER;
}

export function buildSongDetail(context: DashboardContext, label: string): SongDetail {
	const { record, matchCount } = resolveSelection(context, label);
	const { fields } = record;
	const lyrics = fields[LYRICS_FIELD];

	const annotation: AnnotationBlock | null =
		context.annotationsAvailable && record.hasAnnotation
			? {
					theme: text(fields[AI_THEME_FIELD]),
					sentimentCategory: text(fields[AI_SENTIMENT_CATEGORY_FIELD]),
					sentiment: text(fields[AI_SENTIMENT_FIELD]),
					notes: text(fields[AI_NOTES_FIELD]),
				}
			: null;

	const credits = CREDIT_COLUMNS.map((credit) => ({
		role: credit.role,
		label: credit.label,
		value: creditValue(record, credit.columns),
	}));

	const otherFields: DetailField[] = [];
	for (const column of context.table.columns) {
		if (DETAIL_EXCLUDED_FIELDS.has(column)) continue;
		const value = fields[column];
		if (isMissing(value)) continue;
		otherFields.push({ field: column, value });
	}

	return {
		label,
		title: text(fields[TRACK_FIELD]),
		album: text(fields[ALBUM_FIELD]),
		lyrics: isMissing(lyrics) ? null : String(lyrics),
		annotation,
		credits,
		otherFields,
		matchCount,
	};
}
