export type FieldValue = string | number | null;

export type SongRecord = Readonly<{
	/** Position in the source file, used for stable first-match lookups. */
	index: number;
	fields: Readonly<Record<string, FieldValue>>;
	hasAnnotation: boolean;
	displayLabel: string;
}>;

export type SongTable = Readonly<{
	columns: ReadonlyArray<string>;
	records: ReadonlyArray<SongRecord>;
	annotationsAvailable: boolean;
}>;

export type SourceIdentity = Readonly<{
	name: string;
	size: number;
	mtimeMs: number;
	hash: string;
}>;

export type LoadedSongTable = Readonly<{
	table: SongTable;
	source: SourceIdentity;
}>;

export const PLACEHOLDER = "N/A";

export const TRACK_FIELD = "track_name";
export const ALBUM_FIELD = "album_title";
export const LYRICS_FIELD = "lyrics_text";

export const AI_THEME_FIELD = "ai_theme";
export const AI_SENTIMENT_FIELD = "ai_sentiment";
export const AI_SENTIMENT_CATEGORY_FIELD = "ai_sentiment_category";
export const AI_NOTES_FIELD = "ai_notes";

/** Columns that must all be in the header for annotations to count at all. */
export const REQUIRED_ANNOTATION_FIELDS = [
	AI_THEME_FIELD,
	AI_SENTIMENT_FIELD,
	AI_NOTES_FIELD,
] as const;

export const ANNOTATION_FAILURE_MARKERS: ReadonlySet<string> = new Set([
	"SKIPPED",
	"ERROR",
]);

export type CreditRole = "lyricist" | "composer" | "producer" | "arranger";

export type CreditColumn = Readonly<{
	role: CreditRole;
	label: string;
	columns: ReadonlyArray<string>;
}>;

// The upstream export writes the CJK headers; newer exports use the English ones.
export const CREDIT_COLUMNS: ReadonlyArray<CreditColumn> = [
	{ role: "lyricist", label: "Lyricist", columns: ["lyricist", "作詞"] },
	{ role: "composer", label: "Composer", columns: ["composer", "作曲"] },
	{ role: "producer", label: "Producer", columns: ["producer", "製作"] },
	{ role: "arranger", label: "Arranger", columns: ["arranger", "編曲"] },
];

export const GENRE_FIELD = "genre_ros";
export const KEY_FIELD = "key_key";
export const SCALE_FIELD = "key_scale";
export const TIMBRE_FIELD = "timbre";
export const DANCEABILITY_FIELD = "danceability";
export const MOOD_PREFIX = "mood_";

export function isMissing(value: FieldValue | undefined): value is null | undefined {
	return value === null || value === undefined;
}
