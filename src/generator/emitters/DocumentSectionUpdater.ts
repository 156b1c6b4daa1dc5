// File: src/generator/emitters/DocumentSectionUpdater.ts

import { SectionNotFoundError } from "../errors";
import { Logger } from "../Logger";
import { nodeArtifactFileSystem } from "../artifact-io";
import type { ArtifactFileSystem } from "../artifact-io";
import { trimDescriptorField } from "../descriptors/descriptor.schema";
import type { ConfigOption } from "../descriptors/descriptor.schema";
import { DEFAULT_DOCUMENT_MARKERS } from "../options.schema";
import type { DocumentMarkers } from "../options.schema";

const TABLE_HEADER =
    "\n" +
    "| Option | Type | Default value | What it Does |\n" +
    "| --- | --- | --- | --- |\n";

/**
 * Renders the Markdown options table placed between the markers.
 *
 * Starts with a newline so the table begins on the line after the start marker.
 */
export function renderOptionsTable(options: ReadonlyArray<Readonly<ConfigOption>>): string {
    let out = TABLE_HEADER;

    for (const option of options) {
        const cells = [
            trimDescriptorField(option.name),
            trimDescriptorField(option.type),
            trimDescriptorField(option.default),
            // a row must stay on one line
            trimDescriptorField(option.description).replace(/\r?\n/g, " ")
        ].map(escapeCell);
        out += `| ${cells.join(" | ")} |\n`;
    }

    return out;
}

// A bare pipe would start a new column.
function escapeCell(cell: string): string {
    return cell.replace(/\|/g, "\\|");
}

/**
 * Replaces the bytes strictly between the start marker and the end marker.
 *
 * Everything up to and including the start marker, and everything from the end marker on,
 * is copied unchanged. Matching is done on bytes, so the document need not be valid UTF-8.
 *
 * @throws SectionNotFoundError when the start marker is absent, or no end marker follows it.
 */
export function replaceDelimitedSection(
    document: Buffer | string,
    markers: DocumentMarkers,
    replacement: Buffer | string
): Buffer {
    const bytes = typeof document === "string" ? Buffer.from(document, "utf8") : document;

    const startIndex = bytes.indexOf(markers.start, 0, "utf8");
    if (startIndex === -1) {
        throw new SectionNotFoundError("start", markers.start);
    }

    const sectionStart = startIndex + Buffer.byteLength(markers.start, "utf8");
    const sectionEnd = bytes.indexOf(markers.end, sectionStart, "utf8");
    if (sectionEnd === -1) {
        throw new SectionNotFoundError("end", markers.end);
    }

    const replacementBytes = typeof replacement === "string"
        ? Buffer.from(replacement, "utf8")
        : replacement;

    return Buffer.concat([
        bytes.subarray(0, sectionStart),
        replacementBytes,
        bytes.subarray(sectionEnd)
    ]);
}

/**
 * Regenerates the options table inside the document at `targetPath`.
 *
 * The document is read whole, spliced in memory and written back whole. Nothing is written
 * when the markers cannot be found. Assumes no other process writes the file meanwhile.
 */
export function updateDocumentSection(
    options: ReadonlyArray<Readonly<ConfigOption>>,
    targetPath: string,
    markers: DocumentMarkers = DEFAULT_DOCUMENT_MARKERS,
    fileSystem: ArtifactFileSystem = nodeArtifactFileSystem
): void {
    const current = fileSystem.readFile(targetPath);
    Logger.debug(`Read ${current.length} byte(s) from '${targetPath}'`);

    const updated = replaceDelimitedSection(current, markers, renderOptionsTable(options));

    fileSystem.writeFile(targetPath, updated);
    Logger.info(`Updated options table (${options.length} row(s)) in '${targetPath}'`);
}
