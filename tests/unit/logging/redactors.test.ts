/**
 * Unit tests for secret redaction
 */

import { describe, test, expect, afterEach } from "vitest";
import {
  REDACT_PATHS,
  initializeLogger,
  getComponentLogger,
  resetLogger,
} from "../../../src/logging/index.js";
import { UnknownProviderTypeError } from "../../../src/auth/errors.js";
import { createLogCapture } from "../../helpers/log-capture.js";

describe("Secret Redaction", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("REDACT_PATHS", () => {
    test("should include authorization and cookie headers", () => {
      expect(REDACT_PATHS).toContain("headers.authorization");
      expect(REDACT_PATHS).toContain("req.headers.cookie");
    });

    test("should include OAuth query parameters", () => {
      expect(REDACT_PATHS).toContain("query.code");
      expect(REDACT_PATHS).toContain("query.access_token");
    });
  });

  describe("logger redaction", () => {
    test("should redact Authorization headers", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("test").info({ headers: { authorization: "token app-token-1" } }, "headers");

      expect(capture.find((log) => log.msg === "headers")?.["headers"]).toEqual({
        authorization: "[REDACTED]",
      });
    });

    test("should redact nested secret fields", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("test").info(
        { provider: { secret: "test-secret", key: "test-client-id" }, query: { code: "abc", state: "s1" } },
        "config"
      );

      const entry = capture.find((log) => log.msg === "config");
      expect(entry?.["provider"]).toEqual({ secret: "[REDACTED]", key: "test-client-id" });
      expect(entry?.["query"]).toEqual({ code: "[REDACTED]", state: "s1" });
    });

    test("should redact an authorization code posted in the body", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("test").info({ body: { code: "abc", grant: "authorization_code" } }, "callback body");

      expect(capture.find((log) => log.msg === "callback body")?.["body"]).toEqual({
        code: "[REDACTED]",
        grant: "authorization_code",
      });
    });

    test("should keep the machine code of logged errors", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("test").warn({ err: new UnknownProviderTypeError("bogus") }, "rejected");

      expect(capture.find((log) => log.msg === "rejected")?.["err"]).toMatchObject({
        type: "UnknownProviderTypeError",
        message: "Unknown OAuth provider type: bogus",
        code: "UNKNOWN_PROVIDER_TYPE",
        statusCode: 400,
      });
    });
  });
});
