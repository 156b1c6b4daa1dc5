import { z } from "zod";

export const DEFAULT_SCHEMA_METADATA = {
    schemaUri: "http://json-schema.org/schema",
    title: "Config",
    description: "Configuration file"
} as const;

export const DEFAULT_DOCUMENT_MARKERS = {
    start: "<!-- DO NOT EDIT | THIS SECTION IS AUTO-GENERATED | DO NOT EDIT -->",
    end: "<!-- DO NOT EDIT -->"
} as const;

export const DEFAULT_CONFIG_HEADER: readonly string[] = [
    "DO NOT EDIT",
    "Configuration options.",
    "If you want to add a config option edit",
    "the option descriptor document and regenerate.",
    "GENERATED BY config-artifact-gen"
];

/**
 * Options accepted by ConfigArtifactGenerator.
 *
 * They control:
 *  - the metadata fields at the top of the schema document
 *  - which markers delimit the generated section of the documentation
 *  - the header comment of the default-configuration source
 *  - how much diagnostic output is produced
 *
 * This schema is the single source of truth for:
 *  - runtime validation
 *  - defaulting behavior
 *  - TypeScript type inference
 */
export const GeneratorOptionsSchema = z
    .object({
        /**
         * Top-level metadata written ahead of `properties` in the schema document.
         */
        schema: z
            .object({
                schemaUri: z
                    .string()
                    .min(1, "schema.schemaUri must be a non-empty string")
                    .default(DEFAULT_SCHEMA_METADATA.schemaUri),
                title: z.string().default(DEFAULT_SCHEMA_METADATA.title),
                description: z.string().default(DEFAULT_SCHEMA_METADATA.description)
            })
            .strict()
            .default({}),

        /**
         * Literal strings bounding the generated table in the documentation.
         * Both are matched exactly; the end marker is searched for after the start marker.
         */
        documentMarkers: z
            .object({
                start: z
                    .string()
                    .min(1, "documentMarkers.start must be a non-empty string")
                    .default(DEFAULT_DOCUMENT_MARKERS.start),
                end: z
                    .string()
                    .min(1, "documentMarkers.end must be a non-empty string")
                    .default(DEFAULT_DOCUMENT_MARKERS.end)
            })
            .strict()
            .default({}),

        /**
         * Lines of the `//!` header comment, in order.
         */
        defaultConfigHeader: z
            .array(z.string())
            .default([...DEFAULT_CONFIG_HEADER]),

        /**
         * Optional logging verbosity.
         *
         *  - "silent" → no output
         *  - "info"   → one line per artifact written
         *  - "debug"  → detailed internal diagnostics
         *
         * If omitted, logging defaults to "info".
         */
        logLevel: z
            .enum(["silent", "info", "debug"])
            .default("info")
    })
    .strict();

/**
 * Fully-resolved generator options.
 *
 * Notes:
 *  - All fields are guaranteed to be present
 *  - Defaults have already been applied
 */
export type GeneratorOptions = z.infer<typeof GeneratorOptionsSchema>;

export type SchemaMetadata = GeneratorOptions["schema"];

export type DocumentMarkers = GeneratorOptions["documentMarkers"];
