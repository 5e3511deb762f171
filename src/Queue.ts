import { Container } from "./Container.js"
import { ElementDecoder, JsonInput, Maybe } from "./Types.js"

/**
 * A first in, first out sequence. Elements are added at the tail with enqueue and leave from the head with dequeue, in
 * the order they were added. values() and the JSON form both list elements front first.
 */
export interface Queue<T> extends Container<T> {
    /**
     * Adds value at the tail.
     */
    enqueue(value: T): void

    /**
     * Removes and returns the front element. Returns an absent result, and leaves the queue alone, if it is empty.
     */
    dequeue(): Maybe<T>

    /**
     * The front element without removing it.
     */
    peek(): Maybe<T>

    /**
     * Removes every element.
     */
    clear(): void

    /**
     * JSON array of the elements in dequeue order.
     */
    marshal(): string

    /**
     * Replaces the contents with the elements of a JSON array, enqueued in array order. JSON null empties the queue.
     * Throws the SyntaxError from JSON.parse for malformed text, JsonArrayExpectedError for any other non-array, or
     * whatever decode throws. The queue is left untouched when anything throws.
     */
    unmarshal(data: JsonInput, decode: ElementDecoder<T>): void
}
