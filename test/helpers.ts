import { vi } from "vitest";
import { createDashboardContext, type DashboardContext } from "../web/src/lib/context";
import { createDisplayLabel, parseSongCsv } from "../web/src/lib/normalize";
import type { FieldValue, SongRecord, SongTable } from "../web/src/lib/types";

export function tableFrom(csv: string): SongTable {
	return parseSongCsv(csv).table;
}

export function contextFrom(csv: string): DashboardContext {
	return createDashboardContext({
		table: tableFrom(csv),
		source: { name: "songs.csv", size: csv.length, mtimeMs: 0, hash: "test-hash" },
	});
}

export function record(fields: Record<string, FieldValue>, index = 0, hasAnnotation = false): SongRecord {
	return { index, fields, hasAnnotation, displayLabel: createDisplayLabel(fields) };
}

export function records(rows: ReadonlyArray<Record<string, FieldValue>>): SongRecord[] {
	return rows.map((fields, index) => record(fields, index));
}

export function silentLogger() {
	return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** In-memory stand-in for the file system used by the dataset loader. */
export function memoryFileSystem() {
	const files = new Map<string, { bytes: Uint8Array; mtimeMs: number }>();

	const lookup = (filePath: string) => {
		const file = files.get(filePath);
		if (!file) {
			throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), { code: "ENOENT" });
		}
		return file;
	};

	const fs = {
		stat: vi.fn(async (filePath: string) => {
			const file = lookup(filePath);
			return { size: file.bytes.byteLength, mtimeMs: file.mtimeMs };
		}),
		readFile: vi.fn(async (filePath: string) => lookup(filePath).bytes),
	};

	const write = (filePath: string, content: string | Uint8Array, mtimeMs: number) => {
		const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
		files.set(filePath, { bytes, mtimeMs });
	};

	return { fs, write };
}
