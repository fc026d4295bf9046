import { describe, it, expect } from "vitest";
import { formatToken, generateToken, parseToken, personaDirName } from "../../src/rental/token.js";

describe("rental tokens", () => {
  it("prefixes the opaque part with the namespace", () => {
    const { token, opaque } = generateToken("mp", 16);
    expect(token).toBe(`mp@${opaque}`);
    expect(opaque).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it("parses the part after the last @", () => {
    expect(parseToken("mp@abc")).toBe("abc");
    expect(parseToken("a@b@c")).toBe("c");
    expect(parseToken(" abc ")).toBe("abc");
    expect(formatToken("mp", "abc")).toBe("mp@abc");
  });

  it("derives the persona directory from the token alone", () => {
    const dir = personaDirName("mp@abc", "mp");
    expect(dir).toMatch(/^mp-[0-9a-f]{16}$/);
    expect(personaDirName("other@abc", "mp")).toBe(dir);
    expect(personaDirName("mp@abd", "mp")).not.toBe(dir);
  });
});
