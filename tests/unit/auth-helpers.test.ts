import { describe, expect, it } from "vitest";
import { extractBearerToken } from "@/lib/auth-helpers";

describe("extractBearerToken", () => {
  it("reads the token after the scheme", () => {
    expect(extractBearerToken("Bearer test-token")).toBe("test-token");
    expect(extractBearerToken("bearer   test-token  ")).toBe("test-token");
  });

  it("ignores other schemes and empty tokens", () => {
    expect(extractBearerToken(null)).toBeNull();
    expect(extractBearerToken("Basic dGVzdA==")).toBeNull();
    expect(extractBearerToken("Bearer    ")).toBeNull();
  });
});
