import { describe, it, expect } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import { collectHostInfo, resolveUserId } from "../../src/persona/host.js";

describe("host identity", () => {
  it("produces a stable fingerprint", () => {
    const a = collectHostInfo("/srv/agent");
    const b = collectHostInfo("/srv/other");
    expect(a.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(b.fingerprint).toBe(a.fingerprint);
    expect(a.metadata.installPath).toBe("/srv/agent");
    expect(a.metadata.nodeVersion).toBe(process.version);
  });

  it("prefers the configured user id", () => {
    const host = collectHostInfo("/srv/agent");
    expect(resolveUserId(parseConfig({ identity: { userId: "seller-1" } }), host)).toBe("seller-1");
    expect(resolveUserId(parseConfig({}), host)).toBe(host.fingerprint.slice(0, 12));
  });
});
