import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  MAX_RECENT_WORKSPACES,
  WorkspaceService,
  workspacePaths,
} from "../../../src/services/workspace";
import { ConfigWriteError, InvalidDirectory, NoWorkspace } from "../../../src/utils/errors";
import { createMockLogger, listDir, makeTempDir, removeTempDir } from "../../setup";

describe("workspacePaths()", () => {
  test("lays out the workspace under its root", () => {
    expect(workspacePaths("/data/ws")).toEqual({
      root: "/data/ws",
      dropDir: "/data/ws/Drop",
      sortedDir: "/data/ws/Sorted",
      configDir: "/data/ws/DropSorter/config",
      categoriesFile: "/data/ws/DropSorter/config/categories.json",
      userCategoriesFile: "/data/ws/DropSorter/config/user_categories.json",
      lockFile: "/data/ws/DropSorter/config/sorter.lock",
    });
  });
});

describe("WorkspaceService", () => {
  let stateDir: string;
  let root: string;
  let service: WorkspaceService;
  let markerFile: string;
  let recentFile: string;

  beforeEach(async () => {
    stateDir = await makeTempDir("state");
    root = await makeTempDir("ws");
    markerFile = join(stateDir, "workspace.txt");
    recentFile = join(stateDir, "recent_workspaces.txt");
    service = new WorkspaceService({ markerFile, recentFile }, createMockLogger());
  });

  afterEach(async () => {
    await removeTempDir(stateDir);
    await removeTempDir(root);
  });

  describe("ensureWorkspace()", () => {
    test("creates Drop, Sorted and the config folder", async () => {
      const paths = await service.ensureWorkspace(root);

      expect(paths.root).toBe(root);
      expect(await listDir(root)).toEqual(["Drop", "DropSorter", "Sorted"]);
      expect(await listDir(join(root, "DropSorter"))).toEqual(["config"]);
    });

    test("is idempotent and keeps existing content", async () => {
      await service.ensureWorkspace(root);
      await writeFile(join(root, "Drop", "a.txt"), "x");

      await service.ensureWorkspace(root);

      expect(await listDir(join(root, "Drop"))).toEqual(["a.txt"]);
    });

    test("throws NoWorkspace for a missing root", async () => {
      await expect(service.ensureWorkspace(join(root, "missing"))).rejects.toBeInstanceOf(
        NoWorkspace
      );
    });

    test("throws InvalidDirectory for a file", async () => {
      const file = join(root, "file.txt");
      await writeFile(file, "x");

      await expect(service.ensureWorkspace(file)).rejects.toThrow(
        new InvalidDirectory(file).message
      );
    });
  });

  describe("resolveWorkspace()", () => {
    test("prefers the explicit root", async () => {
      await service.writeMarker(stateDir);

      expect(await service.resolveWorkspace(root)).toBe(root);
    });

    test("falls back to the remembered workspace", async () => {
      await service.writeMarker(root);

      expect(await service.resolveWorkspace()).toBe(root);
    });

    test("throws NoWorkspace when nothing is remembered", async () => {
      await expect(service.resolveWorkspace()).rejects.toBeInstanceOf(NoWorkspace);
    });
  });

  describe("readMarker()", () => {
    test("returns the first line trimmed", async () => {
      await writeFile(markerFile, `  ${root}  \nignored\n`);

      expect(await service.readMarker()).toBe(root);
    });

    test("returns null for an empty marker", async () => {
      await writeFile(markerFile, "\n");

      expect(await service.readMarker()).toBeNull();
    });

    test("returns null when the remembered folder is gone", async () => {
      await writeFile(markerFile, join(root, "deleted"));

      expect(await service.readMarker()).toBeNull();
    });
  });

  describe("recent workspaces", () => {
    test("is empty without a recent file", async () => {
      expect(await service.recentWorkspaces()).toEqual([]);
    });

    test("remembering puts the workspace first without duplicates", async () => {
      await service.rememberWorkspace("/ws/a");
      await service.rememberWorkspace("/ws/b");
      const recent = await service.rememberWorkspace("/ws/a");

      expect(recent).toEqual(["/ws/a", "/ws/b"]);
      expect(await readFile(recentFile, "utf-8")).toBe("/ws/a\n/ws/b\n");
      expect(await readFile(markerFile, "utf-8")).toBe("/ws/a");
    });

    test("keeps at most five entries", async () => {
      for (const name of ["a", "b", "c", "d", "e", "f"]) {
        await service.rememberWorkspace(`/ws/${name}`);
      }

      const recent = await service.recentWorkspaces();
      expect(recent).toHaveLength(MAX_RECENT_WORKSPACES);
      expect(recent).toEqual(["/ws/f", "/ws/e", "/ws/d", "/ws/c", "/ws/b"]);
    });

    test("skips blank lines and duplicates in a hand-edited file", async () => {
      await writeFile(recentFile, "/ws/a\n\n  /ws/b  \n/ws/a\n");

      expect(await service.recentWorkspaces()).toEqual(["/ws/a", "/ws/b"]);
    });

    test("throws ConfigWriteError when the state folder cannot be written", async () => {
      const blocked = join(stateDir, "blocker");
      await writeFile(blocked, "");
      const broken = new WorkspaceService(
        { markerFile: join(blocked, "workspace.txt"), recentFile },
        createMockLogger()
      );

      await expect(broken.rememberWorkspace(root)).rejects.toBeInstanceOf(ConfigWriteError);
    });
  });
});
