import { Absent, Present } from "../Types.js"

export const absent: Absent = { present: false, value: undefined }

export function present<T>(value: T): Present<T> {
    return { present: true, value }
}
