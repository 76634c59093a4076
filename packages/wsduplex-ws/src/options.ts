// Options for opening a WsDuplex.

import type { ClientOptions } from "ws";
import type { TransportFactory } from "@wsduplex/core";
import { NodeWebSocketTransport } from "./node.ts";

/** Options for WsDuplex.open and friends. */
export interface OpenOptions {
  /**
   * Builds the transport. Default: a NodeWebSocketTransport over `ws`.
   */
  createTransport?: TransportFactory;

  /**
   * Options for the `ws` client. Only used by the default transport.
   */
  clientOptions?: ClientOptions;

  /**
   * Logger scope, under the `wsduplex:` namespace. Default: "socket"
   */
  logScope?: string;
}

export interface ResolvedOptions {
  createTransport: TransportFactory;
  logScope: string;
}

export function resolveOptions(options: OpenOptions = {}): ResolvedOptions {
  const clientOptions = options.clientOptions;
  return {
    createTransport:
      options.createTransport ??
      ((url, protocols) => new NodeWebSocketTransport(url, protocols, clientOptions)),
    logScope: options.logScope ?? "socket",
  };
}
