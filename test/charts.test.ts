import { describe, expect, it } from "vitest";
import {
	MOOD_LEVEL_HIGH,
	MOOD_LEVEL_LOW,
	categoricalDistribution,
	histogram,
	keyName,
	keyScaleLabel,
	moodCategory,
	moodLevel,
	moodTitle,
	proportionChart,
	proportionDistribution,
} from "../web/src/lib/charts";
import { record, records } from "./helpers";

const genres = records([
	{ genre_ros: "pop" },
	{ genre_ros: "rock" },
	{ genre_ros: "pop" },
	{ genre_ros: "jazz" },
	{ genre_ros: "rock" },
	{ genre_ros: "pop" },
	{ genre_ros: "folk" },
	{ genre_ros: null },
]);

describe("categoricalDistribution", () => {
	it("keeps the top N categories by descending count, ties in first-seen order", () => {
		const chart = categoricalDistribution(genres, "genre_ros", { title: "Genre", topN: 3 });

		expect(chart).toEqual({
			kind: "bar",
			title: "Genre",
			field: "genre_ros",
			topN: 3,
			entries: [
				{ category: "pop", count: 3 },
				{ category: "rock", count: 2 },
				{ category: "jazz", count: 1 },
			],
		});
	});

	it("never returns more than N entries", () => {
		for (const topN of [1, 2, 4, 10]) {
			const chart = categoricalDistribution(genres, "genre_ros", { topN });
			expect(chart?.entries.length).toBeLessThanOrEqual(topN);
		}
	});

	it("returns null for an absent or entirely missing field", () => {
		expect(categoricalDistribution(genres, "timbre")).toBeNull();
		expect(categoricalDistribution(records([{ timbre: null }, { timbre: null }]), "timbre")).toBeNull();
		expect(categoricalDistribution([], "genre_ros")).toBeNull();
	});
});

describe("proportionChart", () => {
	it("computes percentages over the kept entries only", () => {
		const chart = proportionDistribution(genres, "genre_ros", { topN: 2 });

		expect(chart?.total).toBe(5);
		expect(chart?.slices.map((slice) => [slice.category, slice.count])).toEqual([
			["pop", 3],
			["rock", 2],
		]);
		expect(chart?.slices[0]?.percent).toBeCloseTo(60);
		expect(chart?.slices[1]?.percent).toBeCloseTo(40);
	});

	it("has percentages summing to 100", () => {
		const chart = proportionDistribution(genres, "genre_ros", { topN: 3 });
		const sum = chart?.slices.reduce((total, slice) => total + slice.percent, 0);

		expect(sum).toBeCloseTo(100);
	});

	it("binarizes mood scores and leaves missing scores out", () => {
		const moods = records([{ mood_happy: 0.8 }, { mood_happy: 0.2 }, { mood_happy: null }, { mood_happy: 0.5 }]);

		const chart = proportionChart(moods, "mood_happy", moodCategory("mood_happy"), { title: moodTitle("mood_happy") });

		expect(chart?.title).toBe("Mood: Happy");
		expect(chart?.total).toBe(3);
		expect(chart?.slices.map((slice) => [slice.category, slice.count])).toEqual([
			[MOOD_LEVEL_HIGH, 2],
			[MOOD_LEVEL_LOW, 1],
		]);
	});
});

describe("keyName", () => {
	it("maps key indices to note names", () => {
		expect(keyName(0)).toBe("C");
		expect(keyName(1)).toBe("C#");
		expect(keyName(9)).toBe("A");
		expect(keyName(11)).toBe("B");
	});

	it("treats anything outside 0..11 as missing", () => {
		expect(keyName(12)).toBeNull();
		expect(keyName(-1)).toBeNull();
		expect(keyName(2.5)).toBeNull();
		expect(keyName(null)).toBeNull();
		expect(keyName("eleven")).toBeNull();
	});

	it("reads key indices kept as text", () => {
		expect(keyName("3")).toBe("D#");
		expect(keyName(" 9.0 ")).toBe("A");
	});
});

describe("keyScaleLabel", () => {
	it("combines key and scale only when both are present", () => {
		expect(keyScaleLabel(record({ key_key: 9, key_scale: "minor" }))).toBe("A minor");
		expect(keyScaleLabel(record({ key_key: 12, key_scale: "major" }))).toBeNull();
		expect(keyScaleLabel(record({ key_key: 4, key_scale: null }))).toBeNull();
	});
});

describe("moodLevel", () => {
	it("splits at 0.5 inclusive", () => {
		expect(moodLevel(0.5)).toBe(MOOD_LEVEL_HIGH);
		expect(moodLevel(1)).toBe(MOOD_LEVEL_HIGH);
		expect(moodLevel(0.49)).toBe(MOOD_LEVEL_LOW);
		expect(moodLevel(0)).toBe(MOOD_LEVEL_LOW);
		expect(moodLevel(null)).toBeNull();
		expect(moodLevel("0.9")).toBeNull();
	});
});

describe("histogram", () => {
	it("puts values into equal-width bins with the maximum in the last bin", () => {
		const rows = records([{ danceability: 0 }, { danceability: 0.1 }, { danceability: 0.2 }, { danceability: 1 }, { danceability: "n/a" }]);

		const chart = histogram(rows, "danceability", { bins: 2 });

		expect(chart?.bins).toEqual([
			{ start: 0, end: 0.5, count: 3 },
			{ start: 0.5, end: 1, count: 1 },
		]);
	});

	it("produces exactly the requested number of bins", () => {
		const rows = records([{ danceability: 0.05 }, { danceability: 0.95 }, { danceability: 0.4 }]);

		const chart = histogram(rows, "danceability", { bins: 10 });

		expect(chart?.bins).toHaveLength(10);
		expect(chart?.bins.reduce((total, bin) => total + bin.count, 0)).toBe(3);
	});

	it("uses a single bin when every value is equal", () => {
		const rows = records([{ danceability: 0.4 }, { danceability: 0.4 }]);

		expect(histogram(rows, "danceability")?.bins).toEqual([{ start: 0.4, end: 0.4, count: 2 }]);
	});

	it("bins numeric text left unconverted by the loader", () => {
		const rows = records([{ bpm: "120" }, { bpm: "180" }, { bpm: "n/a" }]);

		expect(histogram(rows, "bpm", { bins: 2 })?.bins).toEqual([
			{ start: 120, end: 150, count: 1 },
			{ start: 150, end: 180, count: 1 },
		]);
	});

	it("handles tables larger than the call stack allows as arguments", () => {
		const rows = Array.from({ length: 300_000 }, (_, index) => record({ danceability: (index % 100) / 100 }, index));

		const chart = histogram(rows, "danceability", { bins: 4 });

		expect(chart?.bins[0]?.start).toBe(0);
		expect(chart?.bins[3]?.end).toBe(0.99);
		expect(chart?.bins.reduce((total, bin) => total + bin.count, 0)).toBe(300_000);
	});

	it("returns null without numeric values", () => {
		expect(histogram(records([{ danceability: null }]), "danceability")).toBeNull();
		expect(histogram(records([{ genre_ros: "pop" }]), "danceability")).toBeNull();
	});
});

describe("chart computations", () => {
	it("do not add fields to the records they read", () => {
		const rows = records([{ key_key: 0, key_scale: "major", mood_sad: 0.7 }]);
		const before = rows.map((row) => Object.keys(row.fields));

		proportionChart(rows, "key_scale_combined", keyScaleLabel);
		proportionChart(rows, "mood_sad", moodCategory("mood_sad"));

		expect(rows.map((row) => Object.keys(row.fields))).toEqual(before);
	});
});
