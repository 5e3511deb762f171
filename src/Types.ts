/**
 * Result of reading or removing the front element of a container. When the container is empty present is false and
 * value is undefined.
 */
export type Maybe<T> = Present<T> | Absent

export type Present<T> = { readonly present: true, readonly value: T }

export type Absent = { readonly present: false, readonly value: undefined }

/**
 * Converts one parsed JSON element into T. Throws if the element can't be converted.
 */
export type ElementDecoder<T> = (value: unknown, index: number) => T

/**
 * JSON text, or its UTF-8 bytes.
 */
export type JsonInput = string | Uint8Array
