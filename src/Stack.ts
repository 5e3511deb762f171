import { Container } from "./Container.js"
import { ElementDecoder, JsonInput, Maybe } from "./Types.js"

/**
 * A last in, first out sequence. push adds on top, pop removes the most recently pushed element that's still there.
 *
 * values() lists elements top first. listValues(), iteration and the JSON form list them in push order so that
 * unmarshalling what marshal() wrote rebuilds the same stack.
 */
export interface Stack<T> extends Container<T> {
    push(value: T): void

    /**
     * Removes and returns the top element, or an absent result if the stack is empty.
     */
    pop(): Maybe<T>

    /**
     * The top element without removing it.
     */
    peek(): Maybe<T>

    /**
     * Elements in push order: bottom first, top last.
     */
    listValues(): T[]

    clear(): void

    marshal(): string

    /**
     * Replaces the contents with the elements of a JSON array, pushed in array order so the last element ends up on
     * top. Fails the same way as Queue.unmarshal, leaving the stack untouched.
     */
    unmarshal(data: JsonInput, decode: ElementDecoder<T>): void
}
