import { AbsentSourceError, MalformedSourceError } from "./errors";
import { DATASET_ROUTE, IDENTITY_ROUTE, REFRESH_PARAM } from "./routes";
import { DatasetErrorBodySchema, validateLoadedTable, validateSourceIdentity } from "./schema";
import type { LoadedSongTable, SourceIdentity } from "./types";

export type FetchOptions = {
	/** Ask the server to drop its cached copy before answering. */
	refresh?: boolean;
	baseUrl?: string;
};

function joinBase(baseUrl: string, route: string): string {
	const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
	return `${base}${route}`;
}

async function toDatasetError(response: Response): Promise<Error> {
	let body: unknown;
	try {
		body = await response.json();
	} catch {
		return new Error(`Dataset request failed: ${response.status} ${response.statusText}`);
	}
	const parsed = DatasetErrorBodySchema.safeParse(body);
	if (!parsed.success) {
		return new Error(`Dataset request failed: ${response.status} ${response.statusText}`);
	}
	const { kind, message, path, row } = parsed.data.error;
	if (kind === "absent") return new AbsentSourceError(path ?? "dataset", message);
	if (kind === "malformed") return new MalformedSourceError(message, row);
	return new Error(message);
}

async function fetchJson(url: string): Promise<unknown> {
	const response = await fetch(url, {
		cache: "no-store",
		headers: {
			Accept: "application/json",
		},
	});
	if (!response.ok) {
		throw await toDatasetError(response);
	}
	return response.json();
}

export async function fetchSourceIdentity(options: FetchOptions = {}): Promise<SourceIdentity> {
	const url = joinBase(options.baseUrl ?? import.meta.env.BASE_URL, IDENTITY_ROUTE);
	const checked = validateSourceIdentity(await fetchJson(url));
	if (!checked.ok) {
		throw new MalformedSourceError(`Invalid dataset identity: ${checked.message}`);
	}
	return checked.value;
}

export async function fetchSongTable(options: FetchOptions = {}): Promise<LoadedSongTable> {
	const route = options.refresh ? `${DATASET_ROUTE}?${REFRESH_PARAM}=1` : DATASET_ROUTE;
	const url = joinBase(options.baseUrl ?? import.meta.env.BASE_URL, route);
	const checked = validateLoadedTable(await fetchJson(url));
	if (!checked.ok) {
		throw new MalformedSourceError(`Invalid dataset payload: ${checked.message}`);
	}
	return checked.value;
}
