export type { Container } from "./Container.js"
export type { Queue } from "./Queue.js"
export type { Stack } from "./Stack.js"
export type { Maybe, Present, Absent, ElementDecoder, JsonInput } from "./Types.js"
export { JsonArrayExpectedError, ElementDecodeError, InvariantViolation } from "./Errors.js"
export { setDebug, isDebug } from "./Debug.js"
export * from "./Decoders.js"
export { LinkedListQueue, linkedListQueue } from "./internal/LinkedListQueue.js"
export { LinkedListStack, linkedListStack } from "./internal/LinkedListStack.js"
