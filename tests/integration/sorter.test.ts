import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createApp } from "../../src";
import { CategoryEditor } from "../../src/services/editor";
import { WorkspaceService } from "../../src/services/workspace";
import type { AppConfig, CycleOutcome, CycleSummary, WorkspacePaths } from "../../src/types";
import { createMockLogger, listDir, makeTempDir, removeTempDir, writeFiles } from "../setup";

const config: Pick<AppConfig, "scanIntervalMs" | "tickMs" | "moveConcurrency" | "directoryMode"> =
  {
    scanIntervalMs: 60_000,
    tickMs: 1000,
    moveConcurrency: 4,
    directoryMode: "wholesale",
  };

function summaryOf(outcome: CycleOutcome | null): CycleSummary {
  if (!outcome) throw new Error("no cycle ran");
  if (!outcome.success) throw outcome.error;
  return outcome.summary;
}

describe("Drop folder sorting", () => {
  let root: string;
  let stateDir: string;
  let paths: WorkspacePaths;

  beforeEach(async () => {
    root = await makeTempDir("workspace");
    stateDir = await makeTempDir("state");
    const workspaces = new WorkspaceService(
      {
        markerFile: join(stateDir, "workspace.txt"),
        recentFile: join(stateDir, "recent_workspaces.txt"),
      },
      createMockLogger()
    );
    paths = await workspaces.ensureWorkspace(root);
    await writeFile(
      paths.categoriesFile,
      JSON.stringify({ Docs: ["pdf"], Images: ["jpg"], Videos: ["mkv"], Other: [] })
    );
  });

  afterEach(async () => {
    await removeTempDir(root);
    await removeTempDir(stateDir);
  });

  test("sorts files into their categories and empties the drop folder", async () => {
    await writeFiles(paths.dropDir, {
      "report.pdf": "report",
      "photo.JPG": "photo",
      "movie.mkv": "movie",
    });
    const { scheduler } = createApp(paths, config);
    scheduler.start(paths.dropDir, paths.sortedDir);

    const summary = summaryOf(await scheduler.triggerNow());
    await scheduler.stop();

    expect(summary).toMatchObject({ total: 3, moved: 3, failed: 0 });
    expect(await listDir(paths.dropDir)).toEqual([]);
    expect(await listDir(paths.sortedDir)).toEqual(["Docs", "Images", "Videos"]);
    expect(await readFile(join(paths.sortedDir, "Docs", "report.pdf"), "utf-8")).toBe("report");
    expect(await listDir(join(paths.sortedDir, "Images"))).toEqual(["photo.JPG"]);
    expect(await listDir(join(paths.sortedDir, "Videos"))).toEqual(["movie.mkv"]);
  });

  test("unmatched files go to Other", async () => {
    await writeFiles(paths.dropDir, { "weird.xyz": "" });
    const { engine } = createApp(paths, config);

    const summary = summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));

    expect(summary.byCategory).toEqual({ Other: 1 });
    expect(await listDir(join(paths.sortedDir, "Other"))).toEqual(["weird.xyz"]);
  });

  test("an existing file of the same name is neither overwritten nor deleted", async () => {
    await writeFiles(paths.sortedDir, { "Docs/report.pdf": "already sorted" });
    await writeFiles(paths.dropDir, { "report.pdf": "newer copy" });
    const { engine } = createApp(paths, config);

    const summary = summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));

    expect(summary).toMatchObject({ total: 1, moved: 0, failed: 1 });
    expect(summary.failures[0]?.reason).toBe("collision");
    expect(await readFile(join(paths.dropDir, "report.pdf"), "utf-8")).toBe("newer copy");
    expect(await readFile(join(paths.sortedDir, "Docs", "report.pdf"), "utf-8")).toBe(
      "already sorted"
    );
  });

  test("a dropped folder moves to Other as a unit", async () => {
    await writeFiles(paths.dropDir, {
      "project/README.txt": "readme",
      "project/assets/logo.jpg": "logo",
    });
    const { engine } = createApp(paths, config);

    const summary = summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));

    expect(summary).toMatchObject({ total: 1, moved: 1, byCategory: { Other: 1 } });
    expect(await listDir(paths.sortedDir)).toEqual(["Other"]);
    expect(await listDir(join(paths.sortedDir, "Other", "project"))).toEqual([
      "README.txt",
      "assets",
    ]);
    expect(await listDir(join(paths.sortedDir, "Other", "project", "assets"))).toEqual([
      "logo.jpg",
    ]);
  });

  test("stopping mid-cycle finishes the cycle and starts no other", async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 100; i++) {
      files[`file-${String(i).padStart(3, "0")}.pdf`] = String(i);
    }
    await writeFiles(paths.dropDir, files);

    let stopped: Promise<void> | null = null;
    const { scheduler } = createApp(paths, config, {
      onProgress: (completed) => {
        if (completed === 10) {
          stopped = scheduler.stop();
        }
      },
    });
    scheduler.start(paths.dropDir, paths.sortedDir);

    const summary = summaryOf(await scheduler.triggerNow());
    await stopped;

    expect(stopped).not.toBeNull();
    expect(summary).toMatchObject({ total: 100, moved: 100, failed: 0 });
    expect(await listDir(paths.dropDir)).toEqual([]);
    expect(await listDir(join(paths.sortedDir, "Docs"))).toHaveLength(100);
    expect(scheduler.getState()).toMatchObject({ status: "idle", cyclesRun: 1 });
    expect(await scheduler.triggerNow()).toBeNull();
  });

  test("running again with nothing new is a no-op", async () => {
    await writeFiles(paths.dropDir, { "a.pdf": "" });
    const { engine } = createApp(paths, config);

    summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));
    const second = summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));

    expect(second).toMatchObject({ total: 0, moved: 0, failed: 0 });
    expect(await listDir(join(paths.sortedDir, "Docs"))).toEqual(["a.pdf"]);
  });

  test("saved category edits apply to the next cycle", async () => {
    const { store, engine } = createApp(paths, config);
    const editor = await CategoryEditor.open(store, createMockLogger());
    editor.addCategory("Music");
    editor.addExtension("Music", ".FLAC");
    editor.removeExtension("Docs", "pdf");
    await editor.save();

    expect(await store.loadCategories()).toEqual({
      Docs: [],
      Images: ["jpg"],
      Videos: ["mkv"],
      Other: [],
      Music: ["flac"],
    });

    await writeFiles(paths.dropDir, { "song.flac": "", "paper.pdf": "" });
    const summary = summaryOf(await engine.sortFolder(paths.dropDir, paths.sortedDir));

    expect(summary.byCategory).toEqual({ Music: 1, Other: 1 });
    expect(await listDir(join(paths.sortedDir, "Other"))).toEqual(["paper.pdf"]);
  });
});
