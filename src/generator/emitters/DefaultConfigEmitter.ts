// File: src/generator/emitters/DefaultConfigEmitter.ts

import { Logger } from "../Logger";
import { nodeArtifactFileSystem } from "../artifact-io";
import type { ArtifactFileSystem } from "../artifact-io";
import { trimDescriptorField } from "../descriptors/descriptor.schema";
import type { ConfigOption } from "../descriptors/descriptor.schema";
import { DEFAULT_CONFIG_HEADER } from "../options.schema";

const TRAILER = "\n// DO NOT EDIT\n";

/**
 * Renders the default-configuration source.
 *
 * Layout:
 *
 *   //! <header line>            (one per header line)
 *                                (blank line before every option)
 *   /// <description>
 *   <name>: <type> = <default>,
 *
 *   // DO NOT EDIT
 *
 * Type tokens are written as given. Only the schema emitter checks them against the vocabulary.
 */
export function renderDefaultConfig(
    options: ReadonlyArray<Readonly<ConfigOption>>,
    header: readonly string[] = DEFAULT_CONFIG_HEADER
): string {
    let out = header.map(line => `//! ${line}\n`).join("");

    for (const option of options) {
        out += "\n";
        out += renderDocComment(trimDescriptorField(option.description));
        out += `${trimDescriptorField(option.name)}: ${trimDescriptorField(option.type)} = ${trimDescriptorField(option.default)},\n`;
    }

    return out + TRAILER;
}

/**
 * Overwrites `targetPath` with the rendered default configuration.
 */
export function writeDefaultConfig(
    options: ReadonlyArray<Readonly<ConfigOption>>,
    targetPath: string,
    header: readonly string[] = DEFAULT_CONFIG_HEADER,
    fileSystem: ArtifactFileSystem = nodeArtifactFileSystem
): void {
    const output = renderDefaultConfig(options, header);
    fileSystem.writeFile(targetPath, output);
    Logger.info(`Wrote default configuration for ${options.length} option(s) to '${targetPath}'`);
}

// Multi-line descriptions keep every line inside the doc comment.
function renderDocComment(description: string): string {
    return description
        .split(/\r?\n/)
        .map(line => `/// ${line}\n`)
        .join("");
}
