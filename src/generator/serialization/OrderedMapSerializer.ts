// File: src/generator/serialization/OrderedMapSerializer.ts

/**
 * Serializes insertion-ordered maps to JSON object text.
 *
 * `JSON.stringify` on a plain object reorders integer-like keys ahead of all others,
 * so generated documents are built from `Map`s and written through here instead.
 */

export type JsonScalar = string | number | boolean | null;

export type OrderedMapValue = JsonScalar | OrderedMap;

export type OrderedMap = ReadonlyMap<string, OrderedMapValue>;

export type Whitespace = {
    /**
     * Depth of the map being written. Entries go one level deeper,
     * the closing brace sits at this level.
     */
    indentLevel: number;

    /**
     * One indentation unit. Defaults to four spaces.
     */
    indent?: string;

    /**
     * Write a space after each `:`. Defaults to true.
     */
    separator?: boolean;
};

export type SerializeOptions = {
    /**
     * When omitted, output is compact: no newlines and no spaces.
     */
    whitespace?: Whitespace;
};

const DEFAULT_INDENT = "    ";

export function serializeOrderedMap(
    map: OrderedMap,
    options: SerializeOptions = {}
): string {
    const { whitespace } = options;
    const childWhitespace: Whitespace | undefined = whitespace
        ? { ...whitespace, indentLevel: whitespace.indentLevel + 1 }
        : undefined;

    let out = "{";
    let fieldOutput = false;

    for (const [key, value] of map) {
        if (fieldOutput) {
            out += ",";
        }
        fieldOutput = true;

        if (childWhitespace) {
            out += lineBreak(childWhitespace);
        }

        out += JSON.stringify(key);
        out += ":";
        if (childWhitespace && childWhitespace.separator !== false) {
            out += " ";
        }

        out += serializeValue(value, { whitespace: childWhitespace });
    }

    if (fieldOutput && whitespace) {
        out += lineBreak(whitespace);
    }

    return out + "}";
}

function serializeValue(value: OrderedMapValue, options: SerializeOptions): string {
    if (value !== null && typeof value === "object") {
        return serializeOrderedMap(value, options);
    }
    if (typeof value === "number") {
        return serializeNumber(value);
    }
    return JSON.stringify(value);
}

// JSON has no NaN or Infinity; JSON.stringify would write them as null.
function serializeNumber(value: number): string {
    if (!Number.isFinite(value)) {
        throw new RangeError(`Cannot serialize non-finite number ${value}`);
    }
    return Object.is(value, -0) ? "-0" : JSON.stringify(value);
}

function lineBreak(whitespace: Whitespace): string {
    return "\n" + (whitespace.indent ?? DEFAULT_INDENT).repeat(whitespace.indentLevel);
}
