/**
 * Unit tests for service error classification.
 */

import { DeadlineError, RecognitionError, classifyServiceError } from "../../../src/errors";
import { abortError, httpError } from "../../helpers/fakes";

describe("classifyServiceError", () => {
  it.each<[number, string]>([
    [401, "auth"],
    [403, "auth"],
    [429, "rate_limit"],
    [408, "timeout"],
    [500, "network"],
    [503, "network"],
  ])("maps HTTP %i to %s", (status, reason) => {
    expect(classifyServiceError(httpError(status))).toBe(reason);
  });

  it("keeps the reason of pipeline errors", () => {
    expect(classifyServiceError(new RecognitionError("auth", "bad key"))).toBe("auth");
    expect(classifyServiceError(new DeadlineError("llm", 100))).toBe("timeout");
  });

  it("recognizes aborts and connection failures", () => {
    expect(classifyServiceError(abortError())).toBe("cancelled");
    expect(classifyServiceError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe("network");
    expect(classifyServiceError(new TypeError("fetch failed"))).toBe("network");
  });

  it("falls back to unknown", () => {
    expect(classifyServiceError(new Error("odd"))).toBe("unknown");
    expect(classifyServiceError("odd")).toBe("unknown");
    expect(classifyServiceError(null)).toBe("unknown");
  });
});
