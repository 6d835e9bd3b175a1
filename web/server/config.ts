import path from "node:path";
import { z } from "zod";
import { DEFAULT_NUMERIC_FIELDS } from "../src/lib/normalize";

export const ENV_PREFIX = "SONG_DASHBOARD_";
export const DEFAULT_DATASET_FILE = "data/songs.csv";

const EnvSchema = z.object({
	SONG_DASHBOARD_DATA: z.string().trim().min(1).optional(),
	SONG_DASHBOARD_NUMERIC_FIELDS: z.string().optional(),
});

export type DashboardServerConfig = Readonly<{
	datasetPath: string;
	numericFields: ReadonlyArray<string>;
}>;

function splitList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

/**
 * Relative dataset paths are resolved against `root`. Extra numeric columns are
 * added to the default set, never substituted for it.
 */
export function resolveServerConfig(env: Record<string, string | undefined>, root: string): DashboardServerConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`).join("\n");
		throw new Error(`Invalid dashboard environment:\n${issues}`);
	}
	const { SONG_DASHBOARD_DATA, SONG_DASHBOARD_NUMERIC_FIELDS } = parsed.data;
	const extra = SONG_DASHBOARD_NUMERIC_FIELDS === undefined ? [] : splitList(SONG_DASHBOARD_NUMERIC_FIELDS);

	return {
		datasetPath: path.resolve(root, SONG_DASHBOARD_DATA ?? DEFAULT_DATASET_FILE),
		numericFields: [...new Set([...DEFAULT_NUMERIC_FIELDS, ...extra])],
	};
}
