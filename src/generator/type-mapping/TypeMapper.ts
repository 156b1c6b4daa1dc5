import { UnsupportedTypeError } from "../errors";

/**
 * The closed vocabulary of internal type tokens and the schema type each one maps to.
 *
 * Extending the vocabulary means adding a row here; nothing else dispatches on type tokens.
 */
export const SCHEMA_TYPE_BY_INTERNAL_TYPE = {
    "?[]const u8": "string",
    "bool": "boolean",
    "usize": "integer"
} as const;

export type InternalType = keyof typeof SCHEMA_TYPE_BY_INTERNAL_TYPE;

export type SchemaType = (typeof SCHEMA_TYPE_BY_INTERNAL_TYPE)[InternalType];

export function isInternalType(token: string): token is InternalType {
    return Object.prototype.hasOwnProperty.call(SCHEMA_TYPE_BY_INTERNAL_TYPE, token);
}

/**
 * Maps an internal type token to its schema type.
 *
 * The token is matched exactly; callers trim it first.
 *
 * @throws UnsupportedTypeError when the token is outside the vocabulary.
 */
export function mapType(internalType: string, optionName?: string): SchemaType {
    if (!isInternalType(internalType)) {
        throw new UnsupportedTypeError(internalType, optionName);
    }
    return SCHEMA_TYPE_BY_INTERNAL_TYPE[internalType];
}
