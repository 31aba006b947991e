import { EventEmitter } from "events";
import { type FSWatcher, watch } from "chokidar";
import type { Logger } from "pino";
import { type Mock, afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DropWatcher } from "../../../src/services/watcher";
import { createMockLogger } from "../../setup";

vi.mock("chokidar", () => ({ watch: vi.fn() }));

const DROP = "/tmp/test-workspace/Drop";

class FakeWatcher extends EventEmitter {
  close = vi.fn().mockResolvedValue(undefined);
}

describe("DropWatcher", () => {
  let fake: FakeWatcher;
  let trigger: Mock<() => Promise<unknown>>;
  let logger: Logger;

  beforeEach(() => {
    vi.useFakeTimers();
    fake = new FakeWatcher();
    vi.mocked(watch).mockReturnValue(fake as unknown as FSWatcher);
    trigger = vi.fn<() => Promise<unknown>>().mockResolvedValue(null);
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  function createWatcher(stabilityThresholdMs?: number): DropWatcher {
    return new DropWatcher(DROP, trigger, { debounceMs: 500, stabilityThresholdMs }, logger);
  }

  test("watches only the top level of the drop folder", () => {
    createWatcher().start();

    expect(watch).toHaveBeenCalledWith(DROP, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: { stabilityThreshold: 2000, pollInterval: 500 },
    });
  });

  test("polls no slower than the stability threshold", () => {
    createWatcher(100).start();

    expect(watch).toHaveBeenCalledWith(
      DROP,
      expect.objectContaining({ awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 100 } })
    );
  });

  test("starting twice creates one watcher", () => {
    const watcher = createWatcher();
    watcher.start();
    watcher.start();

    expect(watch).toHaveBeenCalledTimes(1);
  });

  test("a burst of new files triggers one cycle after the quiet period", async () => {
    createWatcher().start();

    fake.emit("add", `${DROP}/a.txt`);
    await vi.advanceTimersByTimeAsync(300);
    fake.emit("add", `${DROP}/b.txt`);
    fake.emit("add", `${DROP}/c.txt`);
    await vi.advanceTimersByTimeAsync(499);
    expect(trigger).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(trigger).toHaveBeenCalledTimes(1);
  });

  test("new folders trigger but the drop folder itself does not", async () => {
    createWatcher().start();

    fake.emit("addDir", DROP);
    await vi.advanceTimersByTimeAsync(1000);
    expect(trigger).not.toHaveBeenCalled();

    fake.emit("addDir", `${DROP}/photos`);
    await vi.advanceTimersByTimeAsync(500);
    expect(trigger).toHaveBeenCalledTimes(1);
  });

  test("a failed trigger is logged", async () => {
    trigger.mockRejectedValueOnce(new Error("busy"));
    createWatcher().start();

    fake.emit("add", `${DROP}/a.txt`);
    await vi.advanceTimersByTimeAsync(500);

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith({ error: "busy" }, "Triggered cycle failed");
    });
  });

  test("watcher errors are logged", () => {
    createWatcher().start();

    fake.emit("error", new Error("EMFILE"));

    expect(logger.error).toHaveBeenCalledWith(
      { error: "EMFILE", dropDir: DROP },
      "Watcher error"
    );
  });

  test("close cancels a pending trigger and closes chokidar", async () => {
    const watcher = createWatcher();
    watcher.start();
    fake.emit("add", `${DROP}/a.txt`);

    await watcher.close();
    await vi.advanceTimersByTimeAsync(1000);

    expect(trigger).not.toHaveBeenCalled();
    expect(fake.close).toHaveBeenCalledTimes(1);
  });
});
