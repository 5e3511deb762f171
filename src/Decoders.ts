import { ElementDecodeError } from "./Errors.js"
import { jsonKind } from "./internal/Json.js"
import { ElementDecoder } from "./Types.js"

export const decodeNumber: ElementDecoder<number> = (value, index) => {
    if (typeof value !== "number") throw new ElementDecodeError(index, "number", jsonKind(value))
    return value
}

export const decodeString: ElementDecoder<string> = (value, index) => {
    if (typeof value !== "string") throw new ElementDecodeError(index, "string", jsonKind(value))
    return value
}

export const decodeBoolean: ElementDecoder<boolean> = (value, index) => {
    if (typeof value !== "boolean") throw new ElementDecodeError(index, "boolean", jsonKind(value))
    return value
}

/**
 * Passes elements through as parsed.
 */
export const decodeUnknown: ElementDecoder<unknown> = (value) => value

/**
 * Decodes an element that is itself an array, applying decode to each of its items. Errors raised by decode carry the
 * index of the inner item.
 */
export function decodeArrayOf<T>(decode: ElementDecoder<T>): ElementDecoder<T[]> {
    return (value, index) => {
        if (!Array.isArray(value)) throw new ElementDecodeError(index, "array", jsonKind(value))
        const items: unknown[] = value
        return items.map((item, itemIndex) => decode(item, itemIndex))
    }
}

export function decodeNullable<T>(decode: ElementDecoder<T>): ElementDecoder<T | null> {
    return (value, index) => value === null ? null : decode(value, index)
}
