import { Stack } from "../Stack.js"
import { ElementDecoder, JsonInput, Maybe } from "../Types.js"
import { debug } from "./Config.js"
import { describeValue, marshalForDisplay, marshalToString, unmarshalArray } from "./Json.js"
import { Head, unlinkAll, unlinkFirst, walkChain } from "./Link.js"
import { absent, present } from "./Maybe.js"

export const linkedListStack: <T>() => Stack<T> = () => new LinkedListStack()

/**
 * Stack kept as a singly linked chain behind a sentinel. The sentinel's next is the top.
 */
export class LinkedListStack<T> implements Stack<T> {
    readonly #head: Head<T> = { next: null }
    #length = 0

    len(): number {
        return this.#length
    }

    push(value: T): void {
        if (debug) console.log(`${this} ${this.constructor.name}.push(${describeValue(value)})`)

        this.#head.next = { next: this.#head.next, value }
        this.#length++

        if (debug) this.#verify()
    }

    pop(): Maybe<T> {
        if (debug && this.#length > 0) console.log(`${this} ${this.constructor.name}.pop()`)

        const top = unlinkFirst(this.#head)
        if (top === null) return absent

        this.#length--

        if (debug) this.#verify()
        return present(top.value)
    }

    peek(): Maybe<T> {
        const top = this.#head.next
        return top === null ? absent : present(top.value)
    }

    values(): T[] {
        const values = new Array<T>(this.#length)
        let link = this.#head.next

        for (let i = 0; link !== null; i++, link = link.next) {
            values[i] = link.value
        }

        return values
    }

    listValues(): T[] {
        const values = new Array<T>(this.#length)
        let link = this.#head.next

        // the top goes last
        for (let i = this.#length - 1; link !== null; i--, link = link.next) {
            values[i] = link.value
        }

        return values
    }

    clear(): void {
        if (debug) console.log(`${this} ${this.constructor.name}.clear()`)

        unlinkAll(this.#head)
        this.#length = 0

        if (debug) this.#verify()
    }

    toString(): string {
        return `LinkedListStack: ${marshalForDisplay(this.listValues())}`
    }

    toJSON(): T[] {
        return this.listValues()
    }

    marshal(): string {
        return marshalToString(this.listValues())
    }

    unmarshal(data: JsonInput, decode: ElementDecoder<T>): void {
        const values = unmarshalArray(data, decode)

        this.clear()
        for (const value of values) {
            this.push(value)
        }
    }

    * [Symbol.iterator](): Iterator<T> {
        yield* this.listValues()
    }

    #verify() {
        walkChain(this.#head, this.#length)
    }
}
