import { assert } from "chai"
import { InvariantViolation } from "../Errors.js"
import { Head, Link, unlinkAll, unlinkFirst, walkChain } from "../internal/Link.js"

function chain(...values: string[]): { head: Head<string>, links: Link<string>[] } {
    const head: Head<string> = { next: null }
    const links: Link<string>[] = []
    let last = head

    for (const value of values) {
        const link: Link<string> = { next: null, value }
        last.next = link
        last = link
        links.push(link)
    }

    return { head, links }
}

describe("Link tests", () => {
    it("unlinkAll() clears every next", () => {
        const { head, links } = chain("a", "b", "c")

        unlinkAll(head)

        assert(head.next === null)
        for (const link of links) {
            assert(link.next === null)
        }
        assert.deepStrictEqual(links.map((link) => link.value), ["a", "b", "c"])
    })

    it("unlinkFirst() detaches the first link and clears its next", () => {
        const { head, links } = chain("a", "b", "c")

        const removed = unlinkFirst(head)

        assert(removed === links[0])
        assert(links[0].next === null)
        assert(head.next === links[1])
        assert(links[1].next === links[2])
        assert(walkChain(head, 2) === links[2])
    })

    it("unlinkFirst() of the last link empties the chain", () => {
        const { head, links } = chain("a")

        assert(unlinkFirst(head) === links[0])
        assert(links[0].next === null)
        assert(head.next === null)
        assert(unlinkFirst(head) === null)
        assert(head.next === null)
    })

    it("walkChain() returns the last link", () => {
        const { head, links } = chain("a", "b", "c")

        assert(walkChain(head, 3) === links[2])
    })

    it("walkChain() of an empty chain returns the head", () => {
        const { head } = chain()

        assert(walkChain(head, 0) === head)
    })

    it("walkChain() rejects a short chain", () => {
        const { head } = chain("a", "b")

        assert.throws(() => walkChain(head, 3), InvariantViolation, "chain ended after 2 of 3 links")
    })

    it("walkChain() rejects a long chain", () => {
        const { head } = chain("a", "b", "c")

        assert.throws(() => walkChain(head, 2), InvariantViolation, "chain continues past 2 links")
    })

    it("walkChain() rejects a cycle", () => {
        const { head, links } = chain("a", "b")
        links[1].next = links[0]

        assert.throws(() => walkChain(head, 3), InvariantViolation, "chain revisits a link at position 2")
    })

    it("walkChain() rejects a negative length", () => {
        const { head } = chain()

        assert.throws(() => walkChain(head, -1), InvariantViolation, "negative length -1")
    })
})
