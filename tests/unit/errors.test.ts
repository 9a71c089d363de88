import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  buildErrorV1,
  getStatusCodeForErrorCode,
  sanitizeErrorMessage,
  toErrorV1,
  zodErrorToErrorV1,
} from "../../src/utils/errors.js";

describe("error.v1", () => {
  it("omits empty details and request id", () => {
    expect(buildErrorV1("INTERNAL", "boom", {})).toEqual({ schema: "error.v1", code: "INTERNAL", message: "boom" });
  });

  it("includes details and request id when present", () => {
    expect(buildErrorV1("NOT_FOUND", "missing", { route: "/x" }, "req-1")).toEqual({
      schema: "error.v1",
      code: "NOT_FOUND",
      message: "missing",
      details: { route: "/x" },
      request_id: "req-1",
    });
  });

  it("flattens zod errors into BAD_INPUT", () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const error = zodErrorToErrorV1(parsed.error, "req-2");

    expect(error.code).toBe("BAD_INPUT");
    expect(error.message).toBe("Validation failed");
    expect(error.request_id).toBe("req-2");
    expect(error.details).toEqual({
      validation_errors: { formErrors: [], fieldErrors: { name: ["Required"] } },
    });
  });

  it("maps 4xx framework errors to BAD_INPUT and everything else to INTERNAL", () => {
    const badBody = Object.assign(new Error("Unexpected end of JSON input"), { statusCode: 400 });

    expect(toErrorV1(badBody).code).toBe("BAD_INPUT");
    expect(toErrorV1(new Error("kaput"))).toEqual({ schema: "error.v1", code: "INTERNAL", message: "kaput" });
    expect(toErrorV1("plain").message).toBe("plain");
    expect(toErrorV1(42).message).toBe("An unexpected error occurred");
  });

  it("redacts paths and keys", () => {
    expect(sanitizeErrorMessage("failed reading /etc/app/catalog.json")).toBe("failed reading [path]");
    expect(sanitizeErrorMessage("OPENAI_API_KEY=test-secret rejected")).toBe("[KEY_REDACTED] rejected");
    expect(sanitizeErrorMessage("token sk-testplaceholder1 invalid")).toBe("token [KEY_REDACTED] invalid");
  });

  it("maps codes to HTTP statuses", () => {
    expect(getStatusCodeForErrorCode("BAD_INPUT")).toBe(400);
    expect(getStatusCodeForErrorCode("NOT_FOUND")).toBe(404);
    expect(getStatusCodeForErrorCode("INTERNAL")).toBe(500);
  });
});
