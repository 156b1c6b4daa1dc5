import fs from "fs";
import os from "os";
import path from "path";

import { SectionNotFoundError } from "../../src/generator/errors";
import {
    renderOptionsTable,
    replaceDelimitedSection,
    updateDocumentSection
} from "../../src/generator/emitters/DocumentSectionUpdater";
import type { ArtifactFileSystem } from "../../src/generator/artifact-io";
import type { ConfigOption } from "../../src/generator/descriptors/descriptor.schema";
import { Logger } from "../../src/generator/Logger";
import { DEFAULT_DOCUMENT_MARKERS } from "../../src/generator/options.schema";

const MARKERS = { start: "<start>", end: "<end>" };

const OPTIONS: ConfigOption[] = [
    { name: "a", description: "desc a", type: "bool", default: "false" },
    { name: "b", description: "desc b", type: "usize", default: "0" }
];

describe("replaceDelimitedSection", () => {
    test("replaces only the bytes between the markers", () => {
        const result = replaceDelimitedSection("X<start>OLD<end>Y", MARKERS, "NEW");

        expect(result.toString("utf8")).toBe("X<start>NEW<end>Y");
    });

    test("fills an empty section", () => {
        expect(replaceDelimitedSection("X<start><end>Y", MARKERS, "NEW").toString("utf8")).toBe(
            "X<start>NEW<end>Y"
        );
    });

    test("stops at the first end marker after the start marker", () => {
        const result = replaceDelimitedSection("<end>A<start>B<end>C<end>D", MARKERS, "N");

        expect(result.toString("utf8")).toBe("<end>A<start>N<end>C<end>D");
    });

    test("searches for the end marker right after the start marker", () => {
        const result = replaceDelimitedSection("A[[B[C", { start: "[[", end: "[" }, "X");

        expect(result.toString("utf8")).toBe("A[[X[C");
    });

    test("keeps bytes that are not valid UTF-8", () => {
        const prefix = Buffer.from([0xff, 0xfe, 0x41]);
        const suffix = Buffer.from([0x42, 0xc3]);
        const document = Buffer.concat([
            prefix,
            Buffer.from("<start>OLD<end>", "utf8"),
            suffix
        ]);

        const result = replaceDelimitedSection(document, MARKERS, "NEW");

        expect(result.equals(Buffer.concat([
            prefix,
            Buffer.from("<start>NEW<end>", "utf8"),
            suffix
        ]))).toBe(true);
    });

    test("fails when the start marker is missing", () => {
        expect(() => replaceDelimitedSection("X OLD<end>Y", MARKERS, "NEW")).toThrow(SectionNotFoundError);
    });

    test("fails when the end marker only appears before the start marker", () => {
        let caught: unknown;
        try {
            replaceDelimitedSection("X<end>OLD<start>Y", MARKERS, "NEW");
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(SectionNotFoundError);
        expect(caught).toMatchObject({ missing: "end", marker: "<end>" });
    });
});

describe("renderOptionsTable", () => {
    test("writes a header, a separator and one row per option", () => {
        expect(renderOptionsTable(OPTIONS)).toBe(
            "\n" +
            "| Option | Type | Default value | What it Does |\n" +
            "| --- | --- | --- | --- |\n" +
            "| a | bool | false | desc a |\n" +
            "| b | usize | 0 | desc b |\n"
        );
    });

    test("trims cells and folds description line breaks", () => {
        const table = renderOptionsTable([
            { name: " c ", description: " one\r\ntwo\n", type: " ?[]const u8", default: "null\t" }
        ]);

        expect(table.split("\n")[3]).toBe("| c | ?[]const u8 | null | one two |");
    });

    test("escapes pipes so every row keeps four columns", () => {
        const table = renderOptionsTable([
            { name: "p", description: "a|b", type: "?[]const u8", default: '"x|y"' }
        ]);

        expect(table.split("\n")[3]).toBe('| p | ?[]const u8 | "x\\|y" | a\\|b |');
    });
});

describe("updateDocumentSection", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-gen-doc-"));
        Logger.setLevel("silent");
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test("rewrites the section and keeps the rest of the file", () => {
        const target = path.join(dir, "README.md");
        const before = `# Title\n\n${DEFAULT_DOCUMENT_MARKERS.start}\nstale\n${DEFAULT_DOCUMENT_MARKERS.end}\n\nFooter\n`;
        fs.writeFileSync(target, before);

        updateDocumentSection(OPTIONS, target);

        expect(fs.readFileSync(target, "utf8")).toBe(
            "# Title\n\n" +
            DEFAULT_DOCUMENT_MARKERS.start +
            "\n| Option | Type | Default value | What it Does |\n" +
            "| --- | --- | --- | --- |\n" +
            "| a | bool | false | desc a |\n" +
            "| b | usize | 0 | desc b |\n" +
            DEFAULT_DOCUMENT_MARKERS.end +
            "\n\nFooter\n"
        );
    });

    test("shrinks the file when the new section is shorter", () => {
        const target = path.join(dir, "README.md");
        fs.writeFileSync(target, `A<start>${"old row\n".repeat(500)}<end>B`);

        updateDocumentSection([], target, MARKERS);

        const expected = "A<start>\n| Option | Type | Default value | What it Does |\n| --- | --- | --- | --- |\n<end>B";
        expect(fs.readFileSync(target, "utf8")).toBe(expected);
        expect(fs.statSync(target).size).toBe(Buffer.byteLength(expected));
    });

    test("leaves the file untouched when the start marker is missing", () => {
        const target = path.join(dir, "README.md");
        const before = "# Title\n\nno markers here\n<end>\n";
        fs.writeFileSync(target, before);

        expect(() => updateDocumentSection(OPTIONS, target, MARKERS)).toThrow(SectionNotFoundError);
        expect(fs.readFileSync(target, "utf8")).toBe(before);
    });

    test("never writes when the markers cannot be found", () => {
        const writeFile = jest.fn();
        const fileSystem: ArtifactFileSystem = {
            readFile: () => Buffer.from("X<start>OLD"),
            writeFile
        };

        expect(() => updateDocumentSection(OPTIONS, "README.md", MARKERS, fileSystem)).toThrow(
            SectionNotFoundError
        );
        expect(writeFile).not.toHaveBeenCalled();
    });

    test("writes the spliced bytes back to the path it read", () => {
        const writeFile = jest.fn();
        const fileSystem: ArtifactFileSystem = {
            readFile: () => Buffer.from("X<start>OLD<end>Y"),
            writeFile
        };

        updateDocumentSection([OPTIONS[0]], "docs/README.md", MARKERS, fileSystem);

        expect(writeFile).toHaveBeenCalledTimes(1);
        const [writtenPath, contents] = writeFile.mock.calls[0];
        expect(writtenPath).toBe("docs/README.md");
        expect(Buffer.from(contents).toString("utf8")).toBe(
            "X<start>\n| Option | Type | Default value | What it Does |\n| --- | --- | --- | --- |\n| a | bool | false | desc a |\n<end>Y"
        );
    });
});
