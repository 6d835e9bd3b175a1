import { describe, expect, it } from "vitest";
import { buildSongDetail, resolveSelection } from "../web/src/lib/detail";
import { StaleSelectionError } from "../web/src/lib/errors";
import { contextFrom } from "./helpers";

const csv = [
	"track_name,album_title,lyrics_text,lyricist,composer,producer,arranger,ai_theme,ai_sentiment,ai_sentiment_category,ai_notes,genre_ros,danceability,mood_happy,bpm",
	"Echo,Rooms,hello there,A. Lin,B. Chen,,D. Ho,Love,warm,Joyful,Sweet,pop,0.75,,120",
	"Quiet,Rooms,,F. Sun,,,,SKIPPED,,,,jazz,,0.2,",
	"Echo,Rooms,second take,X,Y,Z,W,Loss,sad,Sad,Other,rock,0.1,0.9,90",
].join("\n");

describe("resolveSelection", () => {
	it("reports a label that no longer exists", () => {
		const context = contextFrom(csv);

		expect(() => resolveSelection(context, "Gone | Rooms")).toThrow(StaleSelectionError);
		expect(() => resolveSelection(context, "Gone | Rooms")).toThrow(
			'No song matches "Gone | Rooms". The dataset may have changed since the list was built.',
		);
	});

	it("picks the first record for a duplicated label on every call", () => {
		const context = contextFrom(csv);

		const first = resolveSelection(context, "Echo | Rooms");
		const second = resolveSelection(context, "Echo | Rooms");

		expect(first.record.index).toBe(0);
		expect(second.record).toBe(first.record);
		expect(first.matchCount).toBe(2);
	});
});

describe("buildSongDetail", () => {
	it("shows lyrics, annotation, credits and the remaining fields", () => {
		const detail = buildSongDetail(contextFrom(csv), "Echo | Rooms");

		expect(detail.title).toBe("Echo");
		expect(detail.album).toBe("Rooms");
		expect(detail.lyrics).toBe("hello there");
		expect(detail.annotation).toEqual({ theme: "Love", sentimentCategory: "Joyful", sentiment: "warm", notes: "Sweet" });
		expect(detail.credits).toEqual([
			{ role: "lyricist", label: "Lyricist", value: "A. Lin" },
			{ role: "composer", label: "Composer", value: "B. Chen" },
			{ role: "producer", label: "Producer", value: "N/A" },
			{ role: "arranger", label: "Arranger", value: "D. Ho" },
		]);
		expect(detail.otherFields).toEqual([
			{ field: "genre_ros", value: "pop" },
			{ field: "danceability", value: 0.75 },
			{ field: "bpm", value: 120 },
		]);
		expect(detail.matchCount).toBe(2);
	});

	it("shows no analysis for a skipped song", () => {
		const context = contextFrom(csv);
		const detail = buildSongDetail(context, "Quiet | Rooms");

		expect(detail.annotation).toBeNull();
		expect(detail.lyrics).toBeNull();
		expect(detail.otherFields).toEqual([
			{ field: "genre_ros", value: "jazz" },
			{ field: "mood_happy", value: 0.2 },
		]);
		expect(context.selection.map((entry) => entry.label)).toContain("Quiet | Rooms");
	});

	it("reads credits from the legacy CJK headers", () => {
		const legacy = ["track_name,album_title,作詞,作曲,製作,編曲", "Song,Album,詞人,曲人,,編者"].join("\n");

		const detail = buildSongDetail(contextFrom(legacy), "Song | Album");

		expect(detail.credits.map((credit) => credit.value)).toEqual(["詞人", "曲人", "N/A", "編者"]);
		expect(detail.otherFields).toEqual([]);
	});

	it("fills missing annotation sub-fields with the placeholder", () => {
		const sparse = ["track_name,album_title,ai_theme,ai_sentiment,ai_notes", "Song,Album,Hope,,"].join("\n");

		const detail = buildSongDetail(contextFrom(sparse), "Song | Album");

		expect(detail.annotation).toEqual({ theme: "Hope", sentimentCategory: "N/A", sentiment: "N/A", notes: "N/A" });
	});
});
