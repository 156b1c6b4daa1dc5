import { z } from "zod";

/**
 * One configuration option as written in the descriptor document.
 *
 * Values are kept exactly as written; emitters trim them on the way out.
 */
export const ConfigOptionSchema = z
    .object({
        name: z
            .string()
            .refine(name => trimDescriptorField(name).length > 0, "name must be a non-empty string"),

        /**
         * Used in the doc comment, the schema entry and the documentation table.
         */
        description: z.string(),

        /**
         * Internal type token, e.g. "bool", "usize", "?[]const u8".
         */
        type: z.string(),

        /**
         * Literal default expression, emitted verbatim.
         */
        default: z.string(),

        /**
         * Prompt for the interactive setup wizard. Carried through, never rendered.
         */
        setup_question: z.string().nullable().optional()
    })
    .strict();

/**
 * The whole descriptor document: a single `options` field holding the ordered list.
 */
export const ConfigDocumentSchema = z
    .object({
        options: z.array(ConfigOptionSchema)
    })
    .strict()
    .superRefine((document, ctx) => {
        const seen = new Set<string>();

        document.options.forEach((option, index) => {
            const name = trimDescriptorField(option.name);
            if (seen.has(name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["options", index, "name"],
                    message: `duplicate option name '${name}'`
                });
            }
            seen.add(name);
        });
    });

export type ConfigOption = z.infer<typeof ConfigOptionSchema>;

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

/**
 * Strips the whitespace that is insignificant around descriptor fields:
 * spaces, tabs, line feeds and carriage returns. Other Unicode spaces are kept.
 */
export function trimDescriptorField(value: string): string {
    return value.replace(/^[ \t\n\r]+|[ \t\n\r]+$/g, "");
}
