import { z } from "zod";

export const SOURCE_ID_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i;

export const DEFAULT_ACCEPT = [
	"*.html",
	"*.css",
	"*.js",
	"*.svg",
	"*.png",
	"*.jpg",
	"*.jpeg",
	"*.webp",
];
export const DEFAULT_BRANCH = "main";

export const MechanismSchema = z.enum(["bulk-http", "vcs-clone"]);

const SourceBaseSchema = z.object({
	id: z.string().regex(SOURCE_ID_PATTERN),
	label: z.string().min(1),
	url: z.string().min(1),
	dirname: z.string().min(1),
	suffix: z.string().min(1),
});

export const BulkHttpSourceSchema = SourceBaseSchema.extend({
	mechanism: z.literal("bulk-http"),
	nestedDir: z.string().min(1).optional(),
	cutDirs: z.number().int().min(0).default(0),
	accept: z.array(z.string().min(1)).min(1).default(DEFAULT_ACCEPT),
});

export const VcsCloneSourceSchema = SourceBaseSchema.extend({
	mechanism: z.literal("vcs-clone"),
	branch: z.string().min(1).default(DEFAULT_BRANCH),
});

export const SourceDefinitionSchema = z.discriminatedUnion("mechanism", [
	BulkHttpSourceSchema,
	VcsCloneSourceSchema,
]);

// Every field is optional: an entry may patch a built-in source.
export const SourceEntrySchema = z
	.object({
		mechanism: MechanismSchema,
		label: z.string().min(1),
		url: z.string().min(1),
		dirname: z.string().min(1),
		suffix: z.string().min(1),
		nestedDir: z.string().min(1),
		cutDirs: z.number().int().min(0),
		accept: z.array(z.string().min(1)).min(1),
		branch: z.string().min(1),
	})
	.partial()
	.strict();

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		rootDir: z.string().min(1).optional(),
		sources: z.record(z.string().regex(SOURCE_ID_PATTERN), SourceEntrySchema).optional(),
	})
	.strict();

export type SourceDefinition = z.infer<typeof SourceDefinitionSchema>;
export type SourceEntry = z.infer<typeof SourceEntrySchema>;
export type RefmirrorConfigFile = z.infer<typeof ConfigSchema>;
