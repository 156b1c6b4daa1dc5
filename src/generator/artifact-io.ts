import fs from "fs";

/**
 * The file operations the generator performs, passed into each emitter.
 *
 * All calls are synchronous. Each one opens and releases its own handle,
 * so no descriptor outlives the emitter that used it.
 */
export interface ArtifactFileSystem {
    readFile(filePath: string): Buffer;

    /**
     * Replaces the whole file. A shorter write leaves a shorter file.
     */
    writeFile(filePath: string, contents: string | Uint8Array): void;
}

export const nodeArtifactFileSystem: ArtifactFileSystem = {
    readFile(filePath: string): Buffer {
        return fs.readFileSync(filePath);
    },

    writeFile(filePath: string, contents: string | Uint8Array): void {
        fs.writeFileSync(filePath, contents);
    }
};
