import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { ContentTimeoutError } from "./errors.js";
import { withTimeout } from "./timeout.js";

describe("withTimeout", () => {
  it("passes the result through when no timeout is set", async () => {
    let seen: AbortSignal | undefined;
    const result = await withTimeout({
      operation: "load",
      timeoutMs: null,
      run: async (signal) => {
        seen = signal;
        await delay(5);
        return "done";
      },
    });

    expect(result).toBe("done");
    expect(seen?.aborted).toBe(false);
  });

  it("resolves with the operation when it beats the timeout", async () => {
    const result = await withTimeout({
      operation: "load",
      timeoutMs: 1_000,
      run: () => Promise.resolve(42),
    });

    expect(result).toBe(42);
  });

  it("rejects with ContentTimeoutError and aborts the signal on expiry", async () => {
    let seen: AbortSignal | undefined;
    const running = withTimeout({
      operation: "unload",
      timeoutMs: 10,
      run: (signal) => {
        seen = signal;
        return new Promise<never>(() => undefined);
      },
    });

    await expect(running).rejects.toBeInstanceOf(ContentTimeoutError);
    await expect(running).rejects.toThrow("Content unload timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  it("passes the operation's own rejection through", async () => {
    const failure = new Error("read failed");

    await expect(
      withTimeout({ operation: "load", timeoutMs: 1_000, run: () => Promise.reject(failure) }),
    ).rejects.toBe(failure);
  });
});
