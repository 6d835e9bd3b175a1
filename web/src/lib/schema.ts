import { z } from "zod";
import type { LoadedSongTable, SourceIdentity } from "./types";

export const FieldValueSchema = z.union([z.string(), z.number(), z.null()]);

export const SongRecordSchema = z.object({
	index: z.number().int().min(0),
	fields: z.record(z.string(), FieldValueSchema),
	hasAnnotation: z.boolean(),
	displayLabel: z.string(),
});

export const SongTableSchema = z.object({
	columns: z.array(z.string()),
	records: z.array(SongRecordSchema),
	annotationsAvailable: z.boolean(),
});

export const SourceIdentitySchema = z.object({
	name: z.string(),
	size: z.number().min(0),
	mtimeMs: z.number(),
	hash: z.string().min(1),
});

export const LoadedSongTableSchema = z.object({
	table: SongTableSchema,
	source: SourceIdentitySchema,
});

export const DatasetErrorBodySchema = z.object({
	error: z.object({
		kind: z.string(),
		message: z.string(),
		path: z.string().optional(),
		row: z.number().int().optional(),
	}),
});

export type DatasetErrorBody = z.infer<typeof DatasetErrorBodySchema>;

function describeIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; ");
}

export type Validation<T> = { ok: true; value: T } | { ok: false; message: string };

export function validateLoadedTable(payload: unknown): Validation<LoadedSongTable> {
	const result = LoadedSongTableSchema.safeParse(payload);
	return result.success ? { ok: true, value: result.data } : { ok: false, message: describeIssues(result.error) };
}

export function validateSourceIdentity(payload: unknown): Validation<SourceIdentity> {
	const result = SourceIdentitySchema.safeParse(payload);
	return result.success ? { ok: true, value: result.data } : { ok: false, message: describeIssues(result.error) };
}
