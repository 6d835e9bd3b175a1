import {
	type ChartDescriptor,
	DEFAULT_BIN_COUNT,
	DEFAULT_PIE_TOP_N,
	categoricalDistribution,
	fieldCategory,
	histogram,
	keyScaleLabel,
	moodCategory,
	moodTitle,
	proportionChart,
	proportionDistribution,
} from "./charts";
import type { DashboardContext } from "./context";
import {
	AI_SENTIMENT_CATEGORY_FIELD,
	AI_THEME_FIELD,
	DANCEABILITY_FIELD,
	GENRE_FIELD,
	LYRICS_FIELD,
	MOOD_PREFIX,
	TIMBRE_FIELD,
	isMissing,
} from "./types";

export type ChartSlot = Readonly<{
	id: string;
	title: string;
	chart: ChartDescriptor | null;
	/** Shown instead of the chart when `chart` is null. */
	placeholder: string;
}>;

export type OverviewCounters = Readonly<{
	total: number;
	withLyrics: number;
	annotated: number;
}>;

export type AnnotationSection =
	| Readonly<{ status: "available"; sentiment: ChartSlot; themes: ChartSlot }>
	| Readonly<{ status: "unavailable"; reason: string }>;

export type OverviewModel = Readonly<{
	counters: OverviewCounters;
	annotations: AnnotationSection;
	moods: ReadonlyArray<ChartSlot>;
	keyAndTimbre: ReadonlyArray<ChartSlot>;
	numeric: ReadonlyArray<ChartSlot>;
}>;

export const THEME_TOP_N = 10;
export const GENRE_TOP_N = 10;

function slot(id: string, title: string, chart: ChartDescriptor | null, placeholder?: string): ChartSlot {
	return {
		id,
		title,
		chart,
		placeholder: placeholder ?? `No data available for ${title}.`,
	};
}

function buildAnnotationSection(context: DashboardContext): AnnotationSection {
	if (!context.annotationsAvailable) {
		return {
			status: "unavailable",
			reason: "The dataset has no AI analysis columns. Merge the analysis output into the CSV to enable these charts.",
		};
	}
	if (context.annotatedCount === 0) {
		return {
			status: "unavailable",
			reason: "AI analysis columns are present, but no song has a usable analysis result yet.",
		};
	}

	const analyzed = context.table.records.filter((record) => record.hasAnnotation);
	const hasCategory = context.table.columns.includes(AI_SENTIMENT_CATEGORY_FIELD);
	const sentimentTitle = "AI sentiment categories";
	const sentiment = hasCategory
		? slot(
				"ai-sentiment-category",
				sentimentTitle,
				proportionChart(analyzed, AI_SENTIMENT_CATEGORY_FIELD, fieldCategory(AI_SENTIMENT_CATEGORY_FIELD), {
					title: sentimentTitle,
				}),
			)
		: slot("ai-sentiment-category", sentimentTitle, null, `Column '${AI_SENTIMENT_CATEGORY_FIELD}' is not present.`);

	const themeTitle = `Top ${THEME_TOP_N} AI themes`;
	const themes = slot(
		"ai-theme",
		themeTitle,
		categoricalDistribution(analyzed, AI_THEME_FIELD, { title: themeTitle, topN: THEME_TOP_N }),
	);

	return { status: "available", sentiment, themes };
}

export function moodFields(columns: ReadonlyArray<string>): string[] {
	return columns.filter((column) => column.startsWith(MOOD_PREFIX));
}

export function buildOverview(context: DashboardContext): OverviewModel {
	const { records, columns } = context.table;

	const counters: OverviewCounters = {
		total: records.length,
		withLyrics: records.filter((record) => !isMissing(record.fields[LYRICS_FIELD])).length,
		annotated: context.annotatedCount,
	};

	const moods = moodFields(columns).map((field) => {
		const title = moodTitle(field);
		return slot(field, title, proportionChart(records, field, moodCategory(field), { title, topN: DEFAULT_PIE_TOP_N }));
	});

	const keyAndTimbre = [
		slot(
			"key-scale",
			"Key and scale",
			proportionChart(records, "key_scale_combined", keyScaleLabel, {
				title: "Key and scale",
				topN: DEFAULT_PIE_TOP_N,
			}),
		),
		slot("timbre", "Timbre", proportionDistribution(records, TIMBRE_FIELD, { title: "Timbre" })),
		slot("genre", "Genre", categoricalDistribution(records, GENRE_FIELD, { title: "Genre", topN: GENRE_TOP_N })),
	];

	const numeric = [
		slot(
			"danceability",
			"Danceability",
			histogram(records, DANCEABILITY_FIELD, { title: "Danceability", bins: DEFAULT_BIN_COUNT }),
		),
	];

	return {
		counters,
		annotations: buildAnnotationSection(context),
		moods,
		keyAndTimbre,
		numeric,
	};
}
