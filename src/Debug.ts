import { debug, setDebugFlag } from "./internal/Config.js"

/**
 * Turns tracing on or off for every container. While on, each mutation is logged with console.log and the
 * container's chain is checked after it, throwing InvariantViolation if the chain is broken.
 */
export function setDebug(enabled: boolean): void {
    setDebugFlag(enabled)
}

export function isDebug(): boolean {
    return debug
}
