import { toNumber } from "./normalize";
import {
	type FieldValue,
	KEY_FIELD,
	SCALE_FIELD,
	type SongRecord,
	isMissing,
} from "./types";

export type CategoryCount = Readonly<{
	category: string;
	count: number;
}>;

export type ProportionSlice = CategoryCount &
	Readonly<{
		/** Share of the kept total, 0..100. */
		percent: number;
	}>;

export type HistogramBin = Readonly<{
	start: number;
	end: number;
	count: number;
}>;

export type BarChartDescriptor = Readonly<{
	kind: "bar";
	title: string;
	field: string;
	topN: number;
	entries: ReadonlyArray<CategoryCount>;
}>;

export type PieChartDescriptor = Readonly<{
	kind: "pie";
	title: string;
	field: string;
	topN: number;
	total: number;
	slices: ReadonlyArray<ProportionSlice>;
}>;

export type HistogramDescriptor = Readonly<{
	kind: "histogram";
	title: string;
	field: string;
	bins: ReadonlyArray<HistogramBin>;
}>;

export type ChartDescriptor = BarChartDescriptor | PieChartDescriptor | HistogramDescriptor;

/** Turns a record into a category, or `null` when it should be left out. */
export type CategoryAccessor = (record: SongRecord) => string | null;

export type CategoryOptions = {
	title?: string;
	/** Keep at most this many categories. Omit to keep all of them. */
	topN?: number;
};

export type HistogramOptions = {
	title?: string;
	bins?: number;
};

export const DEFAULT_TOP_N = 15;
export const DEFAULT_PIE_TOP_N = 10;
export const DEFAULT_BIN_COUNT = 10;

export const KEY_NAMES: ReadonlyArray<string> = [
	"C",
	"C#",
	"D",
	"D#",
	"E",
	"F",
	"F#",
	"G",
	"G#",
	"A",
	"A#",
	"B",
];

export const MOOD_LEVEL_HIGH = "High (≥ 0.5)";
export const MOOD_LEVEL_LOW = "Low (< 0.5)";
export const MOOD_THRESHOLD = 0.5;

export function fieldCategory(field: string): CategoryAccessor {
	return (record) => {
		const value = record.fields[field];
		return isMissing(value) ? null : String(value);
	};
}

export function keyName(value: FieldValue | undefined): string | null {
	const index = toNumber(value);
	if (index === null || !Number.isInteger(index)) return null;
	return KEY_NAMES[index] ?? null;
}

export function keyScaleLabel(record: SongRecord): string | null {
	const name = keyName(record.fields[KEY_FIELD]);
	const scale = record.fields[SCALE_FIELD];
	if (name === null || isMissing(scale)) return null;
	return `${name} ${String(scale)}`;
}

export function moodLevel(score: FieldValue | undefined): string | null {
	if (typeof score !== "number" || !Number.isFinite(score)) return null;
	return score >= MOOD_THRESHOLD ? MOOD_LEVEL_HIGH : MOOD_LEVEL_LOW;
}

export function moodCategory(field: string): CategoryAccessor {
	return (record) => moodLevel(record.fields[field]);
}

export function moodTitle(field: string): string {
	const name = field.replace(/^mood_/, "");
	return `Mood: ${name.charAt(0).toUpperCase()}${name.slice(1)}`;
}

/**
 * Counts categories in first-seen order, then sorts by descending count.
 * `Array.prototype.sort` is stable, so ties keep first-seen order.
 */
export function countCategories(
	records: ReadonlyArray<SongRecord>,
	accessor: CategoryAccessor,
	topN?: number,
): CategoryCount[] {
	const counts = new Map<string, number>();
	for (const record of records) {
		const category = accessor(record);
		if (category === null) continue;
		counts.set(category, (counts.get(category) ?? 0) + 1);
	}
	const sorted = Array.from(counts, ([category, count]) => ({ category, count })).sort(
		(a, b) => b.count - a.count,
	);
	return topN === undefined ? sorted : sorted.slice(0, Math.max(0, topN));
}

export function categoricalChart(
	records: ReadonlyArray<SongRecord>,
	field: string,
	accessor: CategoryAccessor,
	options: CategoryOptions = {},
): BarChartDescriptor | null {
	const entries = countCategories(records, accessor, options.topN);
	if (entries.length === 0) return null;
	return {
		kind: "bar",
		title: options.title ?? field,
		field,
		topN: options.topN ?? entries.length,
		entries,
	};
}

export function categoricalDistribution(
	records: ReadonlyArray<SongRecord>,
	field: string,
	options: CategoryOptions = {},
): BarChartDescriptor | null {
	return categoricalChart(records, field, fieldCategory(field), {
		topN: DEFAULT_TOP_N,
		...options,
	});
}

export function proportionChart(
	records: ReadonlyArray<SongRecord>,
	field: string,
	accessor: CategoryAccessor,
	options: CategoryOptions = {},
): PieChartDescriptor | null {
	const kept = countCategories(records, accessor, options.topN);
	if (kept.length === 0) return null;
	const total = kept.reduce((sum, entry) => sum + entry.count, 0);
	return {
		kind: "pie",
		title: options.title ?? field,
		field,
		topN: options.topN ?? kept.length,
		total,
		slices: kept.map((entry) => ({ ...entry, percent: (entry.count / total) * 100 })),
	};
}

export function proportionDistribution(
	records: ReadonlyArray<SongRecord>,
	field: string,
	options: CategoryOptions = {},
): PieChartDescriptor | null {
	return proportionChart(records, field, fieldCategory(field), {
		topN: DEFAULT_PIE_TOP_N,
		...options,
	});
}

export function histogram(
	records: ReadonlyArray<SongRecord>,
	field: string,
	options: HistogramOptions = {},
): HistogramDescriptor | null {
	const binCount = Math.max(1, Math.floor(options.bins ?? DEFAULT_BIN_COUNT));
	const values: number[] = [];
	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	for (const record of records) {
		const value = toNumber(record.fields[field]);
		if (value === null) continue;
		values.push(value);
		if (value < min) min = value;
		if (value > max) max = value;
	}
	if (values.length === 0) return null;

	const title = options.title ?? field;

	if (min === max) {
		return { kind: "histogram", title, field, bins: [{ start: min, end: max, count: values.length }] };
	}

	const width = (max - min) / binCount;
	const counts = new Array<number>(binCount).fill(0);
	for (const value of values) {
		const slot = Math.min(binCount - 1, Math.floor((value - min) / width));
		counts[slot] = (counts[slot] ?? 0) + 1;
	}
	const bins = counts.map((count, slot) => ({
		start: min + slot * width,
		end: slot === binCount - 1 ? max : min + (slot + 1) * width,
		count,
	}));
	return { kind: "histogram", title, field, bins };
}
