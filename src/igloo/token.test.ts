// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { decodeToken, encodeToken } from "./token.js";
import { ValidationError } from "../errors/index.js";

describe("continuation tokens", () => {
  it("decodes what it encodes", () => {
    const token = encodeToken({ offset: 40, fingerprint: "abc123" });

    expect(decodeToken(token)).toEqual({ offset: 40, fingerprint: "abc123" });
  });

  it("is URL safe", () => {
    const token = encodeToken({ offset: 123456, fingerprint: "f".repeat(16) });

    expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it("rejects garbage with a validation error on pageToken", () => {
    try {
      decodeToken("not-a-token");
      expect.unreachable("decodeToken should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "pageToken" });
    }
  });

  it("rejects a well-formed payload with a negative offset", () => {
    const token = Buffer.from(JSON.stringify({ v: 1, o: -1, f: "x" })).toString("base64url");

    expect(() => decodeToken(token)).toThrow(ValidationError);
  });
});
