import { assert } from "chai"
import { setDebug } from "../Debug.js"
import { Maybe } from "../Types.js"

export function assertPresent<T>(maybe: Maybe<T>, expected: T) {
    const want: Maybe<T> = { present: true, value: expected }
    assert.deepStrictEqual(maybe, want)
}

export function assertAbsent<T>(maybe: Maybe<T>) {
    assert.isFalse(maybe.present)
    assert.isUndefined(maybe.value)
}

/**
 * Runs block with debug tracing on, so every mutation re-checks the chain, and returns the lines it logged.
 */
export function withDebug(block: () => void): string[] {
    const lines: string[] = []
    const log = console.log
    console.log = (...args: unknown[]) => {
        lines.push(args.map(String).join(" "))
    }
    setDebug(true)

    try {
        block()
    } finally {
        setDebug(false)
        console.log = log
    }

    return lines
}
