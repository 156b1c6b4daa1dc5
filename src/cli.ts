#!/usr/bin/env node
import { Command, Option } from "commander";

import { ConfigArtifactGenerator } from "./generator/ConfigArtifactGenerator";
import { Logger } from "./generator/Logger";
import type { LogLevel } from "./generator/Logger";

type CliOptions = {
    logLevel?: LogLevel;
    schemaTitle?: string;
    schemaDescription?: string;
};

export function createProgram(): Command {
    const program = new Command();

    program
        .name("config-artifact-gen")
        .description(
            "Generate the default configuration, the JSON schema and the documentation options table " +
            "from one option descriptor document"
        )
        .argument("<descriptors>", "option descriptor document (JSON)")
        .argument("<default-config>", "default-configuration source to overwrite")
        .argument("<schema>", "schema document to overwrite")
        .argument("<documentation>", "document whose generated section is replaced in place")
        .addOption(
            new Option("--log-level <level>", "logging verbosity")
                .choices(["silent", "info", "debug"])
        )
        .option("--schema-title <title>", "title written into the schema document")
        .option("--schema-description <text>", "description written into the schema document")
        .action(
            (
                descriptors: string,
                defaultConfig: string,
                schema: string,
                documentation: string,
                opts: CliOptions
            ) => {
                const generator = new ConfigArtifactGenerator({
                    logLevel: opts.logLevel,
                    schema: {
                        title: opts.schemaTitle,
                        description: opts.schemaDescription
                    }
                });

                generator.generate({ descriptors, defaultConfig, schema, documentation });
            }
        );

    return program;
}

export function main(argv: readonly string[] = process.argv): void {
    try {
        createProgram().parse([...argv]);
    } catch (err) {
        Logger.error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main();
}
