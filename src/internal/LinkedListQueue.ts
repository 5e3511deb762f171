import { InvariantViolation } from "../Errors.js"
import { Queue } from "../Queue.js"
import { ElementDecoder, JsonInput, Maybe } from "../Types.js"
import { debug } from "./Config.js"
import { describeValue, marshalForDisplay, marshalToString, unmarshalArray } from "./Json.js"
import { Head, Link, unlinkAll, unlinkFirst, walkChain } from "./Link.js"
import { absent, present } from "./Maybe.js"

export const linkedListQueue: <T>() => Queue<T> = () => new LinkedListQueue()

/**
 * Queue kept as a singly linked chain behind a sentinel. #tail is the last link, or the sentinel itself while the
 * queue is empty, so enqueue never has to special-case an empty queue.
 */
export class LinkedListQueue<T> implements Queue<T> {
    readonly #head: Head<T> = { next: null }
    #tail: Head<T> = this.#head
    #length = 0

    len(): number {
        return this.#length
    }

    enqueue(value: T): void {
        if (debug) console.log(`${this} ${this.constructor.name}.enqueue(${describeValue(value)})`)

        const link: Link<T> = { next: null, value }
        this.#tail.next = link
        this.#tail = link
        this.#length++

        if (debug) this.#verify()
    }

    dequeue(): Maybe<T> {
        if (debug && this.#length > 0) console.log(`${this} ${this.constructor.name}.dequeue()`)

        const first = unlinkFirst(this.#head)
        if (first === null) return absent

        this.#length--

        if (this.#length === 0) {
            this.#tail = this.#head
        }

        if (debug) this.#verify()
        return present(first.value)
    }

    peek(): Maybe<T> {
        const first = this.#head.next
        return first === null ? absent : present(first.value)
    }

    values(): T[] {
        const values = new Array<T>(this.#length)
        let link = this.#head.next

        for (let i = 0; link !== null; i++, link = link.next) {
            values[i] = link.value
        }

        return values
    }

    clear(): void {
        if (debug) console.log(`${this} ${this.constructor.name}.clear()`)

        unlinkAll(this.#head)
        this.#tail = this.#head
        this.#length = 0

        if (debug) this.#verify()
    }

    toString(): string {
        return `LinkedListQueue: ${marshalForDisplay(this.values())}`
    }

    toJSON(): T[] {
        return this.values()
    }

    marshal(): string {
        return marshalToString(this.values())
    }

    unmarshal(data: JsonInput, decode: ElementDecoder<T>): void {
        const values = unmarshalArray(data, decode)

        this.clear()
        for (const value of values) {
            this.enqueue(value)
        }
    }

    * [Symbol.iterator](): Iterator<T> {
        let link = this.#head.next
        while (link !== null) {
            yield link.value
            link = link.next
        }
    }

    #verify() {
        const last = walkChain(this.#head, this.#length)
        if (last !== this.#tail) {
            throw new InvariantViolation(`tail is not the link at position ${this.#length}`)
        }
    }
}
