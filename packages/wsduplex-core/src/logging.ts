// Debug logging for wsduplex.
//
// Uses the `debug` package: output is enabled by namespace pattern, e.g.
// DEBUG=wsduplex:* or DEBUG=wsduplex:relay.

import createDebug from "debug";

export const ROOT_NAMESPACE = "wsduplex";

export type Logger = createDebug.Debugger;

/**
 * Create a logger for a component, namespaced under `wsduplex:`.
 *
 * @example
 * ```typescript
 * const log = createLogger("relay");
 * log("close code=%d reason=%s", event.code, event.reason);
 * ```
 */
export function createLogger(scope: string): Logger {
  return createDebug(`${ROOT_NAMESPACE}:${scope}`);
}
