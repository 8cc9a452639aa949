import { describe, it, expect } from "vitest";
import { VERSION, PRODUCT_NAME } from "../version";
import corePkg from "../../package.json";

describe("version constants", () => {
  it("VERSION is a valid semver string", () => {
    expect(typeof VERSION).toBe("string");
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("VERSION matches the package manifest", () => {
    expect(VERSION).toBe(corePkg.version);
  });

  it("PRODUCT_NAME is tidechat", () => {
    expect(PRODUCT_NAME).toBe("tidechat");
  });
});
