/**
 * Base interface of every container.
 */
export interface Container<T> extends Iterable<T> {
    /**
     * Number of elements, in O(1).
     */
    len(): number

    /**
     * A new array holding every element, in the container's natural order. Later mutations of the container don't
     * affect it.
     */
    values(): T[]

    /**
     * Human readable rendering, for logs only. Never throws: elements JSON can't represent leave the body empty.
     */
    toString(): string

    /**
     * Elements in serialization order, so JSON.stringify(container) gives the same text as marshal().
     */
    toJSON(): T[]
}
