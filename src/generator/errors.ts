import dedent from "ts-dedent";

/**
 * The descriptor document does not have the fixed `{ "options": [...] }` shape.
 *
 * `issues` holds one `<path>: <message>` line per problem found.
 */
export class ParseError extends Error {
    readonly issues: readonly string[];

    constructor(source: string, issues: readonly string[]) {
        super(
            [
                `Invalid option descriptor document (${source}):`,
                ...issues.map(issue => `  - ${issue}`)
            ].join("\n")
        );
        this.name = "ParseError";
        this.issues = issues;
    }
}

/**
 * A type token outside the closed vocabulary reached the schema emitter.
 */
export class UnsupportedTypeError extends Error {
    readonly token: string;
    readonly optionName: string | undefined;

    constructor(token: string, optionName?: string) {
        super(
            optionName === undefined
                ? `Unsupported type '${token}'`
                : `Unsupported type '${token}' for option '${optionName}'`
        );
        this.name = "UnsupportedTypeError";
        this.token = token;
        this.optionName = optionName;
    }
}

export type MissingMarker = "start" | "end";

/**
 * The generated-section markers are missing from the target document,
 * or the end marker does not follow the start marker.
 */
export class SectionNotFoundError extends Error {
    readonly missing: MissingMarker;
    readonly marker: string;

    constructor(missing: MissingMarker, marker: string) {
        const where = missing === "start"
            ? "was not found in the document"
            : "was not found after the start marker";

        super(dedent`
            Generated section not found: the ${missing} marker ${where}.

            Expected marker:
              ${marker}

            Add both markers to the document, start marker first, and run the generator again.
        `);
        this.name = "SectionNotFoundError";
        this.missing = missing;
        this.marker = marker;
    }
}
