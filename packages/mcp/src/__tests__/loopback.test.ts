import { describe, test, expect } from "vitest";
import { isLoopbackHost } from "../loopback";

describe("isLoopbackHost", () => {
  test.each(["localhost", "LOCALHOST", "tools.localhost", "127.0.0.1", "127.8.9.10", "::1", "[::1]"])(
    "%s is loopback",
    (host) => {
      expect(isLoopbackHost(host)).toBe(true);
    },
  );

  test.each(["10.0.0.5", "192.168.1.1", "example.com", "localhost.example.com", "128.0.0.1", "[::2]", "0.0.0.0"])(
    "%s is not loopback",
    (host) => {
      expect(isLoopbackHost(host)).toBe(false);
    },
  );

  test("matches what URL.hostname yields for IPv6", () => {
    expect(isLoopbackHost(new URL("http://[::1]:8080/mcp").hostname)).toBe(true);
  });
});
