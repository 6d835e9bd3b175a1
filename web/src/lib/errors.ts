export type DatasetErrorKind = "absent" | "malformed" | "stale-selection";

export class DatasetError extends Error {
	readonly kind: DatasetErrorKind;

	constructor(kind: DatasetErrorKind, message: string) {
		super(message);
		this.name = "DatasetError";
		this.kind = kind;
	}
}

/** The source file does not exist. Fatal for the dashboard. */
export class AbsentSourceError extends DatasetError {
	readonly path: string;

	constructor(path: string, message = `Dataset file not found: ${path}`) {
		super("absent", message);
		this.name = "AbsentSourceError";
		this.path = path;
	}
}

/** The source file exists but is not a readable CSV. Fatal for the dashboard. */
export class MalformedSourceError extends DatasetError {
	readonly row: number | undefined;

	constructor(message: string, row?: number) {
		super("malformed", message);
		this.name = "MalformedSourceError";
		this.row = row;
	}
}

/** The selected display label no longer matches any record. */
export class StaleSelectionError extends DatasetError {
	readonly label: string;

	constructor(label: string) {
		super("stale-selection", `No song matches "${label}". The dataset may have changed since the list was built.`);
		this.name = "StaleSelectionError";
		this.label = label;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
