import path from "node:path";
import type { Connect, Logger, Plugin } from "vite";
import { AbsentSourceError, MalformedSourceError, errorMessage } from "../src/lib/errors";
import { DATASET_ROUTE, IDENTITY_ROUTE, REFRESH_PARAM } from "../src/lib/routes";
import type { DashboardServerConfig } from "./config";
import { SongSourceCache, type SourceLogger } from "./songSource";

export type DatasetResponse = Readonly<{
	status: number;
	body: unknown;
}>;

export type DatasetRequestContext = Readonly<{
	cache: SongSourceCache;
	datasetPath: string;
}>;

export function errorResponse(error: unknown): DatasetResponse {
	if (error instanceof AbsentSourceError) {
		return {
			status: 404,
			body: { error: { kind: error.kind, message: error.message, path: path.basename(error.path) } },
		};
	}
	if (error instanceof MalformedSourceError) {
		return {
			status: 422,
			body: { error: { kind: error.kind, message: error.message, row: error.row } },
		};
	}
	return { status: 500, body: { error: { kind: "internal", message: errorMessage(error) } } };
}

/** Returns null for URLs outside the dataset routes. */
export async function handleDatasetRequest(
	url: string,
	context: DatasetRequestContext,
): Promise<DatasetResponse | null> {
	const { pathname, searchParams } = new URL(url, "http://localhost");
	if (pathname !== DATASET_ROUTE && pathname !== IDENTITY_ROUTE) {
		return null;
	}
	try {
		if (pathname === DATASET_ROUTE && searchParams.has(REFRESH_PARAM)) {
			context.cache.invalidate(context.datasetPath);
		}
		const loaded = await context.cache.load(context.datasetPath);
		return { status: 200, body: pathname === IDENTITY_ROUTE ? loaded.source : loaded };
	} catch (error) {
		return errorResponse(error);
	}
}

function createDatasetMiddleware(context: DatasetRequestContext): Connect.NextHandleFunction {
	return async (req, res, next) => {
		try {
			const result = await handleDatasetRequest(req.url ?? "/", context);
			if (!result) {
				next();
				return;
			}
			res.statusCode = result.status;
			res.setHeader("Content-Type", "application/json");
			res.setHeader("Cache-Control", "no-store");
			res.end(JSON.stringify(result.body));
		} catch (error) {
			next(error);
		}
	};
}

/** The slice of the dev server the dataset watcher needs. */
export type DatasetWatchServer = {
	watcher: {
		add(filePath: string): unknown;
		on(event: "change", listener: (filePath: string) => void): unknown;
	};
	ws: { send(payload: { type: "full-reload" }): void };
	config: { logger: Pick<Logger, "info"> };
};

/** Drops the cached table and reloads connected clients when the dataset file changes. */
export function watchDataset(server: DatasetWatchServer, context: DatasetRequestContext): void {
	const datasetPath = path.resolve(context.datasetPath);
	server.watcher.add(datasetPath);
	server.watcher.on("change", (file) => {
		if (path.resolve(file) !== datasetPath) return;
		context.cache.invalidate(datasetPath);
		server.config.logger.info(`[song-dataset] ${path.basename(file)} changed; reloading clients`, {
			timestamp: true,
		});
		server.ws.send({ type: "full-reload" });
	});
}

function toSourceLogger(logger: Logger): SourceLogger {
	return {
		info: (message) => logger.info(`[song-dataset] ${message}`, { timestamp: true }),
		warn: (message) => logger.warn(`[song-dataset] ${message}`, { timestamp: true }),
		error: (message) => logger.error(`[song-dataset] ${message}`, { timestamp: true }),
	};
}

export function songDatasetPlugin(config: DashboardServerConfig): Plugin {
	let cache: SongSourceCache | undefined;

	const contextFor = (logger: Logger): DatasetRequestContext => {
		if (!cache) {
			cache = new SongSourceCache({ logger: toSourceLogger(logger), numericFields: config.numericFields });
		}
		return { cache, datasetPath: config.datasetPath };
	};

	return {
		name: "song-dataset",
		configureServer(server) {
			const context = contextFor(server.config.logger);
			server.middlewares.use(createDatasetMiddleware(context));
			watchDataset(server, context);
		},
		configurePreviewServer(server) {
			server.middlewares.use(createDatasetMiddleware(contextFor(server.config.logger)));
		},
	};
}
