import type { ZodIssue } from "zod";

import { ParseError } from "../errors";
import { Logger } from "../Logger";
import { nodeArtifactFileSystem } from "../artifact-io";
import type { ArtifactFileSystem } from "../artifact-io";
import { ConfigDocumentSchema } from "./descriptor.schema";
import type { ConfigOption } from "./descriptor.schema";

/**
 * Parses the descriptor document text into the ordered option sequence.
 *
 * The returned array and its records are frozen: the sequence is read-only for the rest of the run.
 */
export function parseDescriptorDocument(
    text: string,
    source = "<inline>"
): ReadonlyArray<Readonly<ConfigOption>> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ParseError(source, [`not valid JSON: ${reason}`]);
    }

    const result = ConfigDocumentSchema.safeParse(raw);
    if (!result.success) {
        throw new ParseError(source, result.error.issues.map(formatIssue));
    }

    const options = result.data.options.map(option => Object.freeze(option));
    Logger.debug(`Parsed ${options.length} option descriptor(s) from ${source}`);

    return Object.freeze(options);
}

export function loadDescriptors(
    filePath: string,
    fileSystem: ArtifactFileSystem = nodeArtifactFileSystem
): ReadonlyArray<Readonly<ConfigOption>> {
    const text = fileSystem.readFile(filePath).toString("utf8");
    return parseDescriptorDocument(text, filePath);
}

function formatIssue(issue: ZodIssue): string {
    const path = issue.path.length === 0 ? "<root>" : issue.path.join(".");
    return `${path}: ${issue.message}`;
}
