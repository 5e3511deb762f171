export let debug = false

export function setDebugFlag(enabled: boolean): void {
    debug = enabled
}
