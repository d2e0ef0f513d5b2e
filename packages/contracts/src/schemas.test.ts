import { describe, expect, it } from "vitest";
import { AuthorizeRequestSchema, AuthorizeResponseSchema, DECISION_REASONS } from "./schemas.js";

describe("AuthorizeRequestSchema", () => {
  it("trims identifiers and keeps the optional token", () => {
    const parsed = AuthorizeRequestSchema.parse({
      resourceId: " vendor-42 ",
      action: "edit:vendor_info",
      token: "header.payload.signature"
    });

    expect(parsed).toEqual({
      resourceId: "vendor-42",
      action: "edit:vendor_info",
      token: "header.payload.signature"
    });
  });

  it("rejects blank actions", () => {
    const result = AuthorizeRequestSchema.safeParse({ resourceId: "vendor-42", action: "   " });
    expect(result.success).toBe(false);
  });
});

describe("AuthorizeResponseSchema", () => {
  it("accepts every decision reason", () => {
    for (const reason of DECISION_REASONS) {
      expect(
        AuthorizeResponseSchema.safeParse({ allowed: reason === "GRANTED", reason, degraded: false })
          .success
      ).toBe(true);
    }
  });

  it("rejects reasons outside the closed set", () => {
    const result = AuthorizeResponseSchema.safeParse({
      allowed: false,
      reason: "SOMETHING_ELSE",
      degraded: false
    });
    expect(result.success).toBe(false);
  });
});
