import { JsonArrayExpectedError } from "../Errors.js"
import { ElementDecoder, JsonInput } from "../Types.js"

const utf8 = new TextDecoder()

export function marshalToString(values: readonly unknown[]): string {
    return JSON.stringify(values)
}

/**
 * Like marshalToString, but gives an empty string for values JSON.stringify rejects (bigint, cycles). For text that's
 * only ever logged.
 */
export function marshalForDisplay(values: readonly unknown[]): string {
    try {
        return JSON.stringify(values)
    } catch (error) {
        if (error instanceof TypeError) return ""
        throw error
    }
}

/**
 * JSON of value for trace lines, falling back to String(value) when it can't be serialized.
 */
export function describeValue(value: unknown): string {
    try {
        return `${JSON.stringify(value)}`
    } catch (error) {
        if (error instanceof TypeError) return String(value)
        throw error
    }
}

/**
 * Name of the JSON type of a parsed value, as used in decode error messages.
 */
export function jsonKind(value: unknown): string {
    if (value === null) return "null"
    if (Array.isArray(value)) return "array"
    return typeof value
}

/**
 * Parses data as a JSON array, or null read as an empty one, and decodes every element. Nothing is returned unless
 * every element decoded, so callers can clear and refill a container only on success.
 */
export function unmarshalArray<T>(data: JsonInput, decode: ElementDecoder<T>): T[] {
    const text = typeof data === "string" ? data : utf8.decode(data)
    const parsed: unknown = JSON.parse(text)

    if (parsed === null) return []

    if (!Array.isArray(parsed)) {
        throw new JsonArrayExpectedError(jsonKind(parsed))
    }

    const elements: unknown[] = parsed
    return elements.map((element, index) => decode(element, index))
}
