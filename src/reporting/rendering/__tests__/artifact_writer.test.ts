import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { RenderFailure } from "../../domain/errors";
import {
  artifactTarget,
  createFileArtifactWriter,
  stampForPath,
  type ArtifactFs,
} from "../artifact_writer";

describe("artifactTarget", () => {
  test("builds the per-run directory layout", () => {
    const instant = new Date("2024-06-01T12:30:00.000Z");
    expect(stampForPath(instant)).toBe("2024-06-01T12-30-00-000Z");
    expect(artifactTarget("/reports", "AAPL", instant)).toEqual({
      pdfPath: path.join("/reports", "AAPL", "2024-06-01T12-30-00-000Z", "AAPL_investment_report.pdf"),
      markdownPath: path.join("/reports", "AAPL", "2024-06-01T12-30-00-000Z", "AAPL_investment_report.md"),
    });
  });
});

describe("createFileArtifactWriter", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "artifact-writer-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("writes both files and leaves no temp files", async () => {
    const target = artifactTarget(root, "MSFT", new Date("2024-06-01T00:00:00Z"));
    await createFileArtifactWriter().write(target, {
      pdfBytes: new Uint8Array([37, 80, 68, 70]),
      markdown: "# Report",
    });

    expect(readFileSync(target.markdownPath, "utf8")).toBe("# Report");
    expect(readFileSync(target.pdfPath).toString("latin1")).toBe("%PDF");
    expect(readdirSync(path.dirname(target.pdfPath)).sort()).toEqual([
      "MSFT_investment_report.md",
      "MSFT_investment_report.pdf",
    ]);
  });

  test("removes everything it wrote when a step fails", async () => {
    const real = jest.requireActual<typeof import("fs/promises")>("fs/promises");
    const failingFs: ArtifactFs = {
      mkdir: real.mkdir,
      writeFile: real.writeFile,
      unlink: real.unlink,
      rename: async (from, to) => {
        if (to.endsWith(".pdf")) throw new Error("disk full");
        await real.rename(from, to);
      },
    };
    const target = artifactTarget(root, "MSFT", new Date("2024-06-01T00:00:00Z"));

    await expect(
      createFileArtifactWriter(failingFs).write(target, {
        pdfBytes: new Uint8Array([1]),
        markdown: "# Report",
      })
    ).rejects.toThrow(new RenderFailure("Writing report artifacts failed: disk full"));

    expect(existsSync(target.pdfPath)).toBe(false);
    expect(existsSync(target.markdownPath)).toBe(false);
    expect(readdirSync(path.dirname(target.pdfPath))).toEqual([]);
  });

  test("places nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const target = artifactTarget(root, "MSFT", new Date("2024-06-01T00:00:00Z"));

    await expect(
      createFileArtifactWriter().write(
        target,
        { pdfBytes: new Uint8Array([1]), markdown: "# Report" },
        { signal: controller.signal }
      )
    ).rejects.toThrow(new RenderFailure("Writing report artifacts failed: write aborted"));
    expect(existsSync(target.pdfPath)).toBe(false);
    expect(existsSync(path.dirname(target.pdfPath))).toBe(false);
  });

  test("removes renamed files when the signal aborts mid-write", async () => {
    const real = jest.requireActual<typeof import("fs/promises")>("fs/promises");
    const controller = new AbortController();
    const abortingFs: ArtifactFs = {
      mkdir: real.mkdir,
      writeFile: real.writeFile,
      unlink: real.unlink,
      rename: async (from, to) => {
        await real.rename(from, to);
        if (to.endsWith(".md")) controller.abort();
      },
    };
    const target = artifactTarget(root, "MSFT", new Date("2024-06-01T00:00:00Z"));

    await expect(
      createFileArtifactWriter(abortingFs).write(
        target,
        { pdfBytes: new Uint8Array([1]), markdown: "# Report" },
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(RenderFailure);
    expect(readdirSync(path.dirname(target.pdfPath))).toEqual([]);
  });
});

