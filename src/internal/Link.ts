import { InvariantViolation } from "../Errors.js"

/**
 * The sentinel of a chain. Only next is used.
 */
export type Head<T> = { next: LinkOrNull<T> }
export type Link<T> = { next: LinkOrNull<T>, value: T }
export type LinkOrNull<T> = Link<T> | null

/**
 * Detaches the first link after head and clears its next. Returns null if there is none.
 */
export function unlinkFirst<T>(head: Head<T>): LinkOrNull<T> {
    const first = head.next
    if (first === null) return null

    head.next = first.next
    first.next = null
    return first
}

/**
 * Detaches every link after head, clearing each link's next before moving on so that no removed link keeps its
 * successors reachable.
 */
export function unlinkAll<T>(head: Head<T>) {
    let link = head.next
    head.next = null

    while (link !== null) {
        const next = link.next
        link.next = null
        link = next
    }
}

/**
 * Walks exactly length links from head and returns the last node reached (head itself when length is 0). Throws
 * InvariantViolation if the chain is shorter or longer than length, or revisits a link.
 */
export function walkChain<T>(head: Head<T>, length: number): Head<T> {
    if (length < 0) throw new InvariantViolation(`negative length ${length}`)

    const seen = new Set<Head<T>>([head])
    let node: Head<T> = head

    for (let i = 0; i < length; i++) {
        const next = node.next
        if (next === null) throw new InvariantViolation(`chain ended after ${i} of ${length} links`)
        if (seen.has(next)) throw new InvariantViolation(`chain revisits a link at position ${i}`)
        seen.add(next)
        node = next
    }

    if (node.next !== null) throw new InvariantViolation(`chain continues past ${length} links`)
    return node
}
