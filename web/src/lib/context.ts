import type { LoadedSongTable, SongRecord, SongTable, SourceIdentity } from "./types";

export const OVERVIEW_LABEL = "[ Overview dashboard ]";

export type SelectionEntry =
	| Readonly<{ kind: "overview"; label: string }>
	| Readonly<{ kind: "song"; label: string; hasAnnotation: boolean }>;

/**
 * Everything a render needs for one browser session. Built once per loaded
 * table and passed down explicitly; nothing here is mutated after creation.
 */
export type DashboardContext = Readonly<{
	table: SongTable;
	source: SourceIdentity;
	annotationsAvailable: boolean;
	annotatedCount: number;
	selection: ReadonlyArray<SelectionEntry>;
}>;

function compareCodePoints(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/** Annotated songs first, then by display label; the overview entry is always first. */
export function buildSelectionList(records: ReadonlyArray<SongRecord>): SelectionEntry[] {
	const ordered = [...records].sort((a, b) => {
		if (a.hasAnnotation !== b.hasAnnotation) return a.hasAnnotation ? -1 : 1;
		return compareCodePoints(a.displayLabel, b.displayLabel);
	});

	const seen = new Set<string>();
	const entries: SelectionEntry[] = [{ kind: "overview", label: OVERVIEW_LABEL }];
	for (const record of ordered) {
		if (seen.has(record.displayLabel)) continue;
		seen.add(record.displayLabel);
		entries.push({ kind: "song", label: record.displayLabel, hasAnnotation: record.hasAnnotation });
	}
	return entries;
}

export function createDashboardContext(loaded: LoadedSongTable): DashboardContext {
	const { table, source } = loaded;
	return {
		table,
		source,
		annotationsAvailable: table.annotationsAvailable,
		annotatedCount: table.records.filter((record) => record.hasAnnotation).length,
		selection: buildSelectionList(table.records),
	};
}
