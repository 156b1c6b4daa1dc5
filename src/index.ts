/**
 * Package entrypoint.
 *
 * Exposes the generator class for build scripts, plus each stage on its own:
 * loading descriptors, mapping types, serializing ordered maps, and the three emitters.
 * The command-line program lives in `cli.ts`.
 */

export { ConfigArtifactGenerator } from "./generator/ConfigArtifactGenerator";
export type {
    ArtifactOutputs,
    ArtifactPaths,
    GenerationReport,
    GenerationStage
} from "./generator/ConfigArtifactGenerator";

export { GeneratorOptionsSchema } from "./generator/options.schema";
export type { GeneratorOptions, SchemaMetadata, DocumentMarkers } from "./generator/options.schema";
export { validateAndNormalizeGeneratorOptions } from "./generator/generator-configuration-options/validateAndNormalizeGeneratorOptions";

export { loadDescriptors, parseDescriptorDocument } from "./generator/descriptors/DescriptorLoader";
export { ConfigDocumentSchema, ConfigOptionSchema, trimDescriptorField } from "./generator/descriptors/descriptor.schema";
export type { ConfigDocument, ConfigOption } from "./generator/descriptors/descriptor.schema";

export { mapType, isInternalType, SCHEMA_TYPE_BY_INTERNAL_TYPE } from "./generator/type-mapping/TypeMapper";
export type { InternalType, SchemaType } from "./generator/type-mapping/TypeMapper";

export { serializeOrderedMap } from "./generator/serialization/OrderedMapSerializer";
export type { OrderedMap, OrderedMapValue, SerializeOptions } from "./generator/serialization/OrderedMapSerializer";

export { renderDefaultConfig, writeDefaultConfig } from "./generator/emitters/DefaultConfigEmitter";
export { buildSchemaProperties, renderSchema, writeSchema } from "./generator/emitters/SchemaEmitter";
export {
    renderOptionsTable,
    replaceDelimitedSection,
    updateDocumentSection
} from "./generator/emitters/DocumentSectionUpdater";

export { nodeArtifactFileSystem } from "./generator/artifact-io";
export type { ArtifactFileSystem } from "./generator/artifact-io";

export { ParseError, UnsupportedTypeError, SectionNotFoundError } from "./generator/errors";
export { Logger } from "./generator/Logger";
export type { LogLevel } from "./generator/Logger";
