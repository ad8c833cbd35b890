import { describe, it, expect, vi } from "vitest";
import { run, dispatch } from "./dispatcher";
import type { RunDependencies } from "./dispatcher";
import { summarize } from "./reporter";
import { CompletionCounter, Logger, Tracker, loadDefaultConfig } from "../utils";
import {
  MemoryFileSystem,
  MemorySink,
  ScriptedFetcher,
  PIXEL,
  downloadConfig,
  failure,
} from "../testing/fakes";
import type { DecodedImage, DownloadConfig, Result } from "../types";

function setup(fetcher: ScriptedFetcher, fs = new MemoryFileSystem()): RunDependencies {
  return {
    fetcher,
    sink: new MemorySink(fs),
    fs,
    counter: new CompletionCounter(),
    logger: new Logger("error"),
    tracker: new Tracker(),
  };
}

function options(overrides: Partial<DownloadConfig> = {}) {
  return { download: downloadConfig(overrides), outputFolder: "images" };
}

function delayed(ms: number): Promise<Result<DecodedImage>> {
  return new Promise((resolve) => setTimeout(() => resolve({ ok: true, value: PIXEL }), ms));
}

describe("run", () => {
  it("records success and permanent failure per URL", async () => {
    const fetcher = new ScriptedFetcher((url) =>
      url.endsWith("y.jpg") ? failure("HTTP 404: Not Found") : { ok: true, value: PIXEL },
    );
    const deps = setup(fetcher);

    const result = await run(
      ["http://a/x.jpg", "http://a/y.jpg"],
      options({ maxWorkers: 2, maxAttempts: 3 }),
      deps,
    );

    expect(Object.fromEntries(result)).toEqual({
      "http://a/x.jpg": "succeeded",
      "http://a/y.jpg": "permanently-failed",
    });
    expect(fetcher.callsFor("http://a/y.jpg")).toBe(3);
    expect(summarize(result).failedUrls).toEqual(["http://a/y.jpg"]);
    expect(deps.counter.value).toBe(1);
  });

  it("counts every concurrent success exactly once", async () => {
    const urls = Array.from({ length: 50 }, (_, i) => `http://a/${i}.png`);
    const fetcher = new ScriptedFetcher((_url, call) => delayed(call % 5));
    const deps = setup(fetcher);

    const result = await run(urls, options({ maxWorkers: 50 }), deps);

    expect(result.size).toBe(50);
    expect(deps.counter.value).toBe(50);
    expect([...result.values()].every((outcome) => outcome === "succeeded")).toBe(true);
  });

  it("never runs more tasks at once than maxWorkers", async () => {
    let active = 0;
    let peak = 0;
    const fetcher = new ScriptedFetcher(async () => {
      active++;
      peak = Math.max(peak, active);
      const result = await delayed(5);
      active--;
      return result;
    });
    const urls = Array.from({ length: 10 }, (_, i) => `http://a/${i}.png`);

    await run(urls, options({ maxWorkers: 3 }), setup(fetcher));

    expect(peak).toBe(3);
  });

  it("marks slow tasks as timed out and carries on with the rest", async () => {
    const fetcher = new ScriptedFetcher((url) =>
      // Ignores the abort signal and never settles
      url.includes("slow") ? new Promise<Result<DecodedImage>>(() => {}) : { ok: true, value: PIXEL },
    );
    const deps = setup(fetcher);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = await run(
      ["http://a/slow.jpg", "http://a/fast.jpg"],
      options({ maxWorkers: 1, taskTimeout: 0.05 }),
      deps,
    );
    warn.mockRestore();

    expect(Object.fromEntries(result)).toEqual({
      "http://a/slow.jpg": "timed-out",
      "http://a/fast.jpg": "succeeded",
    });
    expect(summarize(result).failedUrls).toEqual(["http://a/slow.jpg"]);
  });

  it("aborts the signal of a task that times out", async () => {
    let aborted = false;
    const fetcher = new ScriptedFetcher(
      (_url, _call, signal) =>
        new Promise((resolve) => {
          signal?.addEventListener("abort", () => {
            aborted = true;
            resolve(failure("aborted"));
          });
        }),
    );
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = await run(["http://a/x.jpg"], options({ taskTimeout: 0.02 }), setup(fetcher));
    warn.mockRestore();

    expect(result.get("http://a/x.jpg")).toBe("timed-out");
    expect(aborted).toBe(true);
  });

  it("keeps one entry per distinct URL and skips repeated ones", async () => {
    const fetcher = new ScriptedFetcher();
    const deps = setup(fetcher);

    const result = await run(
      ["http://a/x.jpg", "http://a/x.jpg", "http://a/y.jpg"],
      options(),
      deps,
    );

    expect(Object.fromEntries(result)).toEqual({
      "http://a/x.jpg": "skipped",
      "http://a/y.jpg": "succeeded",
    });
    expect(fetcher.callsFor("http://a/x.jpg")).toBe(1);
    expect(deps.counter.value).toBe(3);
  });

  it("does not fetch already downloaded URLs on a second run", async () => {
    const fs = new MemoryFileSystem();
    const fetcher = new ScriptedFetcher();
    const urls = ["http://a/1.jpg", "http://a/2.jpg", "http://a/3.jpg"];

    const first = await run(urls, options({ maxWorkers: 2 }), setup(fetcher, fs));
    const second = await run(urls, options({ maxWorkers: 2 }), setup(fetcher, fs));

    expect([...first.values()]).toEqual(["succeeded", "succeeded", "succeeded"]);
    expect([...second.values()]).toEqual(["skipped", "skipped", "skipped"]);
    expect(fetcher.calls).toHaveLength(3);
  });

  it("records a task whose fetcher throws as permanently failed", async () => {
    const fetcher = new ScriptedFetcher(() => {
      throw new Error("bug in fetcher");
    });
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await run(["http://a/x.jpg"], options(), setup(fetcher));
    error.mockRestore();

    expect(result.get("http://a/x.jpg")).toBe("permanently-failed");
  });

  it("returns an empty result for an empty list", async () => {
    const result = await run([], options(), setup(new ScriptedFetcher()));
    expect(result.size).toBe(0);
  });
});

describe("dispatch", () => {
  it("requires the reader to run first", async () => {
    const fs = new MemoryFileSystem();
    await expect(
      dispatch({
        config: loadDefaultConfig(),
        collaborators: { fetcher: new ScriptedFetcher(), sink: new MemorySink(fs), fs },
        logger: new Logger("error"),
        tracker: new Tracker(),
        counter: new CompletionCounter(),
      }),
    ).rejects.toThrow("Reader must run before dispatcher");
  });
});
