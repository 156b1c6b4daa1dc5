import { GeneratorOptionsSchema } from "../options.schema";
import type { GeneratorOptions } from "../options.schema";

/**
 * Parse, validate, and normalize (i.e., apply defaults where field is missing) the caller-supplied generator options.
 */
export function validateAndNormalizeGeneratorOptions(input?: unknown): GeneratorOptions {
    // If caller passes nothing, we still want schema defaults to apply.
    return GeneratorOptionsSchema.parse(input ?? {});
}
