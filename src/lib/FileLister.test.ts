/**
 * Unit tests for FileLister
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { FileLister, isManifestMode } from "./FileLister";
import { ILogger } from "../interfaces/ILogger";
import { UnsupportedModeError } from "../types";

function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, "utf-8").split("\n");
}

describe("FileLister", () => {
  let testDir: string;
  let sourceDir: string;
  let outputPath: string;
  let logger: jest.Mocked<ILogger>;
  let lister: FileLister;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-lister-test-"));
    sourceDir = path.join(testDir, "source");
    outputPath = path.join(testDir, "manifest.csv");
    fs.mkdirSync(sourceDir);
    fs.writeFileSync(path.join(sourceDir, "a.txt"), "alpha");
    fs.writeFileSync(path.join(sourceDir, "b.txt"), "bravo-bravo");
    fs.mkdirSync(path.join(sourceDir, "nested"));
    fs.writeFileSync(path.join(sourceDir, "nested", "c.txt"), "charlie");

    logger = createMockLogger();
    lister = new FileLister(logger);
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe("simple mode", () => {
    it("should write a header and one name per file", async () => {
      const result = await lister.listFiles(sourceDir, "simple", outputPath);

      const lines = readLines(outputPath);
      expect(lines).toHaveLength(4);
      expect(lines[0]).toBe("file_name");
      expect(lines.slice(1, 3).sort()).toEqual(["a.txt", "b.txt"]);
      expect(lines[3]).toBe("");
      expect(result).toEqual({ outputPath, filesListed: 2 });
    });

    it("should default to simple mode", async () => {
      await lister.listFiles(sourceDir, undefined, outputPath);
      expect(readLines(outputPath)[0]).toBe("file_name");
    });

    it("should truncate an existing manifest", async () => {
      fs.writeFileSync(outputPath, "stale line one\nstale line two\n".repeat(20));

      await lister.listFiles(sourceDir, "simple", outputPath);

      expect(readLines(outputPath)).toHaveLength(4);
    });

    it("should list the manifest itself when it is written into the listed directory", async () => {
      const insidePath = path.join(sourceDir, "files_list.csv");

      const result = await lister.listFiles(sourceDir, "simple", insidePath);

      expect(result.filesListed).toBe(3);
      expect(readLines(insidePath).slice(1, 4).sort()).toEqual([
        "a.txt",
        "b.txt",
        "files_list.csv",
      ]);
    });
  });

  describe("full mode", () => {
    it("should write location, name, size and modification time", async () => {
      fs.utimesSync(
        path.join(sourceDir, "a.txt"),
        1700000000.5,
        1700000000.5
      );

      await lister.listFiles(sourceDir, "full", outputPath, "\t");

      const lines = readLines(outputPath);
      expect(lines[0]).toBe("location\tfilename\tsize\tlast_modified");

      const rows = lines
        .slice(1, 3)
        .map((line) => line.split("\t"))
        .sort((left, right) => left[1].localeCompare(right[1]));
      expect(rows).toHaveLength(2);
      for (const row of rows) {
        expect(row).toHaveLength(4);
        expect(row[0]).toBe(sourceDir);
      }

      expect(rows[0][1]).toBe("a.txt");
      expect(rows[0][2]).toBe("5");
      expect(rows[0][3]).toBe("1700000000.5");
      expect(rows[1][1]).toBe("b.txt");
      expect(rows[1][2]).toBe(String(Buffer.byteLength("bravo-bravo")));
      expect(Number(rows[1][3])).toBeGreaterThan(0);
    });

    it("should join the header with the default comma", async () => {
      await lister.listFiles(sourceDir, "full", outputPath);
      expect(readLines(outputPath)[0]).toBe(
        "location,filename,size,last_modified"
      );
    });
  });

  it("should log the number of listed files", async () => {
    await lister.listFiles(sourceDir, "simple", outputPath);

    expect(logger.info).toHaveBeenCalledWith(
      "2 files listed",
      expect.objectContaining({ mode: "simple" })
    );
  });

  it("should reject an unknown mode without touching the output", async () => {
    fs.writeFileSync(outputPath, "keep");

    await expect(
      lister.listFiles(sourceDir, "wide", outputPath)
    ).rejects.toBeInstanceOf(UnsupportedModeError);
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("keep");
  });

  it("should not create the output for an unknown mode", async () => {
    await expect(
      lister.listFiles(sourceDir, "FULL", outputPath)
    ).rejects.toThrow("Unsupported manifest mode: FULL. Must be simple or full");
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("should keep the header when the source directory is missing", async () => {
    await expect(
      lister.listFiles(path.join(testDir, "missing"), "simple", outputPath)
    ).rejects.toMatchObject({ code: "ENOENT" });
    expect(fs.readFileSync(outputPath, "utf-8")).toBe("file_name\n");
  });

  describe("isManifestMode", () => {
    it("should accept only the two known modes", () => {
      expect(isManifestMode("simple")).toBe(true);
      expect(isManifestMode("full")).toBe(true);
      expect(isManifestMode("Simple")).toBe(false);
      expect(isManifestMode("")).toBe(false);
    });
  });
});
