/**
 * Endpoint parsing. Turns a URL string into the pieces the connector needs,
 * or throws EndpointError.
 * @module Client
 */

import { EndpointError } from "../errors.js";

export type EndpointProtocol = "http" | "https";

export interface Endpoint {
  /** Normalized URL string. */
  url: string;
  protocol: EndpointProtocol;
  /** Hostname without brackets (IPv6 literals are unwrapped). */
  hostname: string;
  port: number;
  /** Request target: path plus query string. Never empty. */
  path: string;
  /** Value for the Host header; includes the port when it is not the default. */
  hostHeader: string;
}

const DEFAULT_PORTS: Record<EndpointProtocol, number> = { http: 80, https: 443 };

function toProtocol(scheme: string): EndpointProtocol | null {
  if (scheme === "http:") return "http";
  if (scheme === "https:") return "https";
  return null;
}

export function parseEndpoint(input: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch (err) {
    throw new EndpointError(`Malformed endpoint URL: ${input}`, { cause: err });
  }

  const protocol = toProtocol(parsed.protocol);
  if (!protocol) {
    throw new EndpointError(`Unsupported endpoint scheme "${parsed.protocol}" in ${input}`);
  }
  if (!parsed.hostname) {
    throw new EndpointError(`Endpoint URL has no host: ${input}`);
  }

  const port = parsed.port ? Number.parseInt(parsed.port, 10) : DEFAULT_PORTS[protocol];
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, "$1");

  return {
    url: parsed.href,
    protocol,
    hostname,
    port,
    path: `${parsed.pathname || "/"}${parsed.search}`,
    hostHeader: parsed.host,
  };
}
