import { describe, expect, it } from "vitest";
import { PipelineClosedError } from "../../src/errors";
import { abortReason, sleep } from "../../src/utils/sleep";

describe("sleep", () => {
  it("resolves after the delay, ref'd or not", async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
    await expect(sleep(5, undefined, { keepAlive: true })).resolves.toBeUndefined();
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(5_000, controller.signal);
    controller.abort(new PipelineClosedError());

    await expect(pending).rejects.toBeInstanceOf(PipelineClosedError);
  });

  it("rejects at once on an already aborted signal", async () => {
    await expect(sleep(5_000, AbortSignal.abort("gone"))).rejects.toThrow("gone");
    expect(abortReason(undefined).name).toBe("AbortError");
  });
});
