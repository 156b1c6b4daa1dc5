// File: src/generator/ConfigArtifactGenerator.ts

import { Logger } from "./Logger";
import { nodeArtifactFileSystem } from "./artifact-io";
import type { ArtifactFileSystem } from "./artifact-io";
import { loadDescriptors } from "./descriptors/DescriptorLoader";
import type { ConfigOption } from "./descriptors/descriptor.schema";
import { writeDefaultConfig } from "./emitters/DefaultConfigEmitter";
import { updateDocumentSection } from "./emitters/DocumentSectionUpdater";
import { writeSchema } from "./emitters/SchemaEmitter";
import { validateAndNormalizeGeneratorOptions } from "./generator-configuration-options/validateAndNormalizeGeneratorOptions";
import type { GeneratorOptions } from "./options.schema";

/**
 * Where each generated artifact goes.
 */
export type ArtifactOutputs = {
    /** Default-configuration source. Overwritten. */
    defaultConfig: string;

    /** JSON Schema document. Overwritten. */
    schema: string;

    /** Existing document holding the generated-section markers. Edited in place. */
    documentation: string;
};

export type ArtifactPaths = ArtifactOutputs & {
    /** Option descriptor document. */
    descriptors: string;
};

export type GenerationStage =
    | "load-descriptors"
    | "default-config"
    | "schema"
    | "documentation";

export type GenerationReport = {
    optionCount: number;
    setupQuestionCount: number;
    written: ArtifactOutputs;
};

/**
 * Generates the default configuration, the schema and the documentation table
 * from one ordered list of option descriptors.
 *
 * Emitters run one after another. The first failure ends the run; artifacts already
 * written by earlier emitters are left in place.
 */
export class ConfigArtifactGenerator {
    private readonly options: GeneratorOptions;
    private readonly fileSystem: ArtifactFileSystem;

    constructor(options?: unknown, fileSystem: ArtifactFileSystem = nodeArtifactFileSystem) {
        this.options = validateAndNormalizeGeneratorOptions(options);
        this.fileSystem = fileSystem;

        Logger.setLevel(this.options.logLevel);
        Logger.debug("Generator options validated and normalized");
    }

    generate(paths: ArtifactPaths): GenerationReport {
        const descriptors = runStage("load-descriptors", paths.descriptors, () =>
            loadDescriptors(paths.descriptors, this.fileSystem)
        );
        Logger.info(`Loaded ${descriptors.length} option descriptor(s) from '${paths.descriptors}'`);

        return this.generateFromDescriptors(descriptors, paths);
    }

    generateFromDescriptors(
        descriptors: ReadonlyArray<Readonly<ConfigOption>>,
        outputs: ArtifactOutputs
    ): GenerationReport {
        runStage("default-config", outputs.defaultConfig, () =>
            writeDefaultConfig(
                descriptors,
                outputs.defaultConfig,
                this.options.defaultConfigHeader,
                this.fileSystem
            )
        );

        runStage("schema", outputs.schema, () =>
            writeSchema(descriptors, outputs.schema, this.options.schema, this.fileSystem)
        );

        runStage("documentation", outputs.documentation, () =>
            updateDocumentSection(
                descriptors,
                outputs.documentation,
                this.options.documentMarkers,
                this.fileSystem
            )
        );

        const setupQuestionCount = descriptors.filter(
            option => option.setup_question !== undefined && option.setup_question !== null
        ).length;

        if (setupQuestionCount > 0) {
            Logger.info(
                `${setupQuestionCount} option(s) declare a setup question; ` +
                "update the setup wizard if any of them are new"
            );
        }

        return {
            optionCount: descriptors.length,
            setupQuestionCount,
            written: {
                defaultConfig: outputs.defaultConfig,
                schema: outputs.schema,
                documentation: outputs.documentation
            }
        };
    }
}

// Names the failing stage and artifact, then rethrows the original error untouched.
function runStage<T>(stage: GenerationStage, artifactPath: string, fn: () => T): T {
    Logger.debug(`Entering stage '${stage}' for '${artifactPath}'`);
    try {
        return fn();
    } catch (err) {
        Logger.error(`Stage '${stage}' failed for '${artifactPath}'`);
        throw err;
    }
}
