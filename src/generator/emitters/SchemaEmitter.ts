// File: src/generator/emitters/SchemaEmitter.ts

import { Logger } from "../Logger";
import { nodeArtifactFileSystem } from "../artifact-io";
import type { ArtifactFileSystem } from "../artifact-io";
import { trimDescriptorField } from "../descriptors/descriptor.schema";
import type { ConfigOption } from "../descriptors/descriptor.schema";
import { DEFAULT_SCHEMA_METADATA } from "../options.schema";
import type { SchemaMetadata } from "../options.schema";
import { serializeOrderedMap } from "../serialization/OrderedMapSerializer";
import type { OrderedMap, OrderedMapValue } from "../serialization/OrderedMapSerializer";
import { mapType } from "../type-mapping/TypeMapper";

/**
 * Builds the `properties` map: option name to `{ description, type, default }`, in descriptor order.
 *
 * @throws UnsupportedTypeError on the first option whose type is outside the vocabulary.
 */
export function buildSchemaProperties(
    options: ReadonlyArray<Readonly<ConfigOption>>
): OrderedMap {
    const properties = new Map<string, OrderedMapValue>();

    for (const option of options) {
        const name = trimDescriptorField(option.name);

        properties.set(
            name,
            new Map<string, OrderedMapValue>([
                ["description", trimDescriptorField(option.description)],
                ["type", mapType(trimDescriptorField(option.type), name)],
                ["default", trimDescriptorField(option.default)]
            ])
        );
    }

    return properties;
}

export function renderSchema(
    options: ReadonlyArray<Readonly<ConfigOption>>,
    metadata: SchemaMetadata = DEFAULT_SCHEMA_METADATA
): string {
    const properties = buildSchemaProperties(options);

    const document = new Map<string, OrderedMapValue>([
        ["$schema", metadata.schemaUri],
        ["title", metadata.title],
        ["description", metadata.description],
        ["type", "object"],
        ["properties", properties]
    ]);

    return serializeOrderedMap(document, { whitespace: { indentLevel: 0 } }) + "\n";
}

/**
 * Overwrites `targetPath` with the schema document.
 *
 * Type mapping finishes before the file is touched, so an unsupported type leaves the target as it was.
 */
export function writeSchema(
    options: ReadonlyArray<Readonly<ConfigOption>>,
    targetPath: string,
    metadata: SchemaMetadata = DEFAULT_SCHEMA_METADATA,
    fileSystem: ArtifactFileSystem = nodeArtifactFileSystem
): void {
    const output = renderSchema(options, metadata);
    fileSystem.writeFile(targetPath, output);
    Logger.info(`Wrote schema with ${options.length} propert${options.length === 1 ? "y" : "ies"} to '${targetPath}'`);
}
