import { assert } from "chai"
import {
    decodeArrayOf,
    decodeBoolean,
    decodeNullable,
    decodeNumber,
    decodeString,
    decodeUnknown,
} from "../Decoders.js"
import { ElementDecodeError } from "../Errors.js"
import { assertPresent } from "../internal/Assert.js"
import { LinkedListQueue } from "../internal/LinkedListQueue.js"
import { LinkedListStack } from "../internal/LinkedListStack.js"

function assertDecodeError(block: () => void, message: string) {
    assert.throws(block, ElementDecodeError, message)
}

describe("Decoders tests", () => {
    it("decodeNumber()", () => {
        assert(decodeNumber(1.5, 0) === 1.5)
        assertDecodeError(() => decodeNumber("1", 2), "Element 2: expected number but got string.")
    })

    it("decodeString()", () => {
        assert(decodeString("", 0) === "")
        assertDecodeError(() => decodeString([], 0), "Element 0: expected string but got array.")
    })

    it("decodeBoolean()", () => {
        assert(decodeBoolean(false, 0) === false)
        assertDecodeError(() => decodeBoolean(0, 4), "Element 4: expected boolean but got number.")
    })

    it("decodeUnknown()", () => {
        const value = { a: [1] }
        assert(decodeUnknown(value, 0) === value)
    })

    it("decodeArrayOf()", () => {
        const decode = decodeArrayOf(decodeNumber)

        assert.deepStrictEqual(decode([1, 2], 0), [1, 2])
        assertDecodeError(() => decode({}, 3), "Element 3: expected array but got object.")
        assertDecodeError(() => decode([1, "a"], 5), "Element 1: expected number but got string.")
    })

    it("decodeNullable()", () => {
        const decode = decodeNullable(decodeString)

        assert(decode(null, 0) === null)
        assert(decode("a", 0) === "a")
        assertDecodeError(() => decode(true, 1), "Element 1: expected string but got boolean.")
    })

    it("queue of nested arrays", () => {
        const q = new LinkedListQueue<number[] | null>()
        q.unmarshal("[[1,2],null,[]]", decodeNullable(decodeArrayOf(decodeNumber)))

        assert.deepStrictEqual(q.values(), [[1, 2], null, []])
        assert(q.marshal() === "[[1,2],null,[]]")
    })

    it("stack of unknown values", () => {
        const s = new LinkedListStack<unknown>()
        s.unmarshal(`[1,"a",{"b":true}]`, decodeUnknown)

        assertPresent(s.peek(), { b: true })
        assert(s.marshal() === `[1,"a",{"b":true}]`)
    })
})
