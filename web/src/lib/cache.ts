import { del, get, set } from "idb-keyval";
import { errorMessage } from "./errors";
import { validateLoadedTable } from "./schema";
import type { LoadedSongTable } from "./types";

const DATASET_KEY = "song-dashboard-dataset";

/**
 * Returns the persisted table only when it was built from a source with the
 * given content hash. Anything else, including an unreadable entry, is a miss.
 */
export async function loadCachedTable(expectedHash: string): Promise<LoadedSongTable | undefined> {
	const value = await get<unknown>(DATASET_KEY);
	if (value === undefined) return undefined;
	const checked = validateLoadedTable(value);
	if (!checked.ok) {
		console.warn(`Discarding unreadable cached dataset: ${checked.message}`);
		await del(DATASET_KEY);
		return undefined;
	}
	return checked.value.source.hash === expectedHash ? checked.value : undefined;
}

/** Resolves false when the browser refuses to store the table; the dashboard runs without it. */
export async function saveCachedTable(loaded: LoadedSongTable): Promise<boolean> {
	try {
		await set(DATASET_KEY, loaded);
		return true;
	} catch (error) {
		console.warn(`Unable to cache dataset locally: ${errorMessage(error)}`);
		return false;
	}
}

export async function clearCachedTable(): Promise<void> {
	await del(DATASET_KEY);
}
