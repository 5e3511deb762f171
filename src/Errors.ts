/**
 * Thrown when unmarshalling JSON that parsed to something other than an array.
 */
export class JsonArrayExpectedError extends Error {
    name = `JsonArrayExpectedError`

    constructor(readonly actual: string) {
        super(`Expected a JSON array but got ${actual}.`)
    }
}

/**
 * Thrown by the stock element decoders when an element is not of the expected JSON type.
 */
export class ElementDecodeError extends Error {
    name = `ElementDecodeError`

    constructor(readonly index: number, readonly expected: string, readonly actual: string) {
        super(`Element ${index}: expected ${expected} but got ${actual}.`)
    }
}

/**
 * Thrown by the debug self-check when a container's chain no longer matches its length or tail.
 */
export class InvariantViolation extends Error {
    name = `InvariantViolation`
}
