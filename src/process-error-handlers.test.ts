import { afterEach, describe, expect, it, vi } from "vitest";
import { registerProcessErrorHandlers } from "./process-error-handlers";

describe("registerProcessErrorHandlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers the process listeners only once", () => {
    const onSpy = vi.spyOn(process, "on").mockImplementation(() => process);
    globalThis.__parlorProcessErrorHandlersRegistered = undefined;

    registerProcessErrorHandlers();
    registerProcessErrorHandlers();

    expect(onSpy.mock.calls.map(([event]) => event)).toEqual([
      "unhandledRejection",
      "uncaughtException",
    ]);
    expect(globalThis.__parlorProcessErrorHandlersRegistered).toBe(true);
  });
});
