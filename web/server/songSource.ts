import { createHash } from "node:crypto";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { AbsentSourceError, MalformedSourceError, errorMessage } from "../src/lib/errors";
import { type NormalizeOptions, parseSongCsv } from "../src/lib/normalize";
import type { LoadedSongTable } from "../src/lib/types";

export type SourceLogger = {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
};

export type SourceFileSystem = {
	stat(filePath: string): Promise<{ size: number; mtimeMs: number }>;
	readFile(filePath: string): Promise<Uint8Array>;
};

export type SongSourceOptions = NormalizeOptions & {
	logger?: SourceLogger;
	fs?: SourceFileSystem;
};

type CacheEntry = {
	size: number;
	mtimeMs: number;
	loaded: LoadedSongTable;
};

const nodeFileSystem: SourceFileSystem = { stat, readFile };

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function hashContent(bytes: Uint8Array): string {
	return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Loads and normalizes dataset files, one entry per resolved path.
 *
 * A matching size and mtime returns the cached table without touching the
 * file. Otherwise the file is re-read and hashed; an unchanged hash reuses the
 * parsed table. Concurrent loads of one path share a single in-flight read.
 */
export class SongSourceCache {
	private readonly entries = new Map<string, CacheEntry>();
	private readonly inflight = new Map<string, Promise<LoadedSongTable>>();
	private readonly logger: SourceLogger;
	private readonly fs: SourceFileSystem;
	private readonly normalize: NormalizeOptions;

	constructor(options: SongSourceOptions = {}) {
		const { logger, fs, ...normalize } = options;
		this.logger = logger ?? console;
		this.fs = fs ?? nodeFileSystem;
		this.normalize = normalize;
	}

	get size(): number {
		return this.entries.size;
	}

	load(filePath: string): Promise<LoadedSongTable> {
		const key = path.resolve(filePath);
		const pending = this.inflight.get(key);
		if (pending) return pending;
		const task: Promise<LoadedSongTable> = this.refresh(key).finally(() => {
			// An invalidation may already have replaced this task with a newer one.
			if (this.inflight.get(key) === task) this.inflight.delete(key);
		});
		this.inflight.set(key, task);
		return task;
	}

	invalidate(filePath: string): boolean {
		const key = path.resolve(filePath);
		this.inflight.delete(key);
		return this.entries.delete(key);
	}

	clear(): void {
		this.inflight.clear();
		this.entries.clear();
	}

	private async refresh(key: string): Promise<LoadedSongTable> {
		try {
			return await this.read(key);
		} catch (error) {
			this.entries.delete(key);
			if (isNotFound(error)) {
				const absent = new AbsentSourceError(key);
				this.logger.error(absent.message);
				throw absent;
			}
			this.logger.error(`Failed to load dataset ${key}: ${errorMessage(error)}`);
			throw error;
		}
	}

	private async read(key: string): Promise<LoadedSongTable> {
		const stats = await this.fs.stat(key);
		const cached = this.entries.get(key);
		if (cached && cached.size === stats.size && cached.mtimeMs === stats.mtimeMs) {
			return cached.loaded;
		}

		const bytes = await this.fs.readFile(key);
		const hash = hashContent(bytes);
		const source = {
			name: path.basename(key),
			size: stats.size,
			mtimeMs: stats.mtimeMs,
			hash,
		};

		if (cached && cached.loaded.source.hash === hash) {
			const loaded = { table: cached.loaded.table, source };
			this.entries.set(key, { size: stats.size, mtimeMs: stats.mtimeMs, loaded });
			this.logger.info(`Dataset ${source.name} touched but unchanged; reusing parsed table`);
			return loaded;
		}

		let text: string;
		try {
			text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
		} catch {
			throw new MalformedSourceError(`Dataset ${source.name} is not valid UTF-8`);
		}

		const { table, warnings } = parseSongCsv(text, this.normalize);
		for (const warning of warnings) {
			this.logger.warn(`Dataset ${source.name}: ${warning}`);
		}

		const loaded = { table, source };
		this.entries.set(key, { size: stats.size, mtimeMs: stats.mtimeMs, loaded });
		this.logger.info(
			`Loaded ${table.records.length} songs from ${source.name} (sha256 ${hash.slice(0, 12)})`,
		);
		return loaded;
	}
}
