import { describe, expect, it } from "vitest";
import { resolveServerConfig } from "../web/server/config";
import { DEFAULT_NUMERIC_FIELDS } from "../web/src/lib/normalize";

describe("resolveServerConfig", () => {
	it("defaults to data/songs.csv under the root", () => {
		expect(resolveServerConfig({}, "/repo")).toEqual({
			datasetPath: "/repo/data/songs.csv",
			numericFields: DEFAULT_NUMERIC_FIELDS,
		});
	});

	it("resolves relative and absolute dataset paths", () => {
		expect(resolveServerConfig({ SONG_DASHBOARD_DATA: "exports/final.csv" }, "/repo").datasetPath).toBe(
			"/repo/exports/final.csv",
		);
		expect(resolveServerConfig({ SONG_DASHBOARD_DATA: "/mnt/songs.csv" }, "/repo").datasetPath).toBe("/mnt/songs.csv");
	});

	it("adds listed numeric columns to the defaults", () => {
		const config = resolveServerConfig({ SONG_DASHBOARD_NUMERIC_FIELDS: "bpm, energy ,," }, "/repo");

		expect(config.numericFields).toEqual(["danceability", "key_key", "key_strength", "bpm", "loudness", "energy"]);
	});

	it("keeps the default numeric columns for an empty list", () => {
		expect(resolveServerConfig({ SONG_DASHBOARD_NUMERIC_FIELDS: " , " }, "/repo").numericFields).toEqual(
			DEFAULT_NUMERIC_FIELDS,
		);
	});

	it("rejects a blank dataset path", () => {
		expect(() => resolveServerConfig({ SONG_DASHBOARD_DATA: "   " }, "/repo")).toThrow("Invalid dashboard environment");
	});
});
