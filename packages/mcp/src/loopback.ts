// Loopback address detection for local-only tool servers

const IPV4_LOOPBACK = /^127(?:\.\d{1,3}){3}$/;

/**
 * True for `localhost` (and `*.localhost`), `127.0.0.0/8` and `::1`.
 * Accepts a bare hostname or the bracketed IPv6 form URL.hostname returns.
 */
export function isLoopbackHost(hostname: string): boolean {
  const host = hostname.replace(/^\[/, "").replace(/\]$/, "").toLowerCase();
  if (host === "localhost" || host.endsWith(".localhost")) return true;
  if (host === "::1" || host === "0:0:0:0:0:0:0:1") return true;
  return IPV4_LOOPBACK.test(host);
}
