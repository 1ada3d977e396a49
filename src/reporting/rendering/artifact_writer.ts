import { randomUUID } from "crypto";
import { mkdir, rename, unlink, writeFile } from "fs/promises";
import path from "path";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/result";
import { RenderFailure } from "../domain/errors";
import type { ArtifactTarget, ArtifactWriter } from "../infrastructure/contracts";

const log = getLogger("artifact-writer");

export interface ArtifactFs {
  mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
  writeFile(file: string, data: Uint8Array | string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(file: string): Promise<void>;
}

const nodeFs: ArtifactFs = { mkdir, writeFile, rename, unlink };

/** `2024-06-01T12:30:00.000Z` → `2024-06-01T12-30-00-000Z` */
export function stampForPath(instant: Date): string {
  return instant.toISOString().replace(/[:.]/g, "-");
}

export function artifactTarget(outputDir: string, ticker: string, instant: Date): ArtifactTarget {
  const dir = path.join(outputDir, ticker, stampForPath(instant));
  const base = `${ticker}_investment_report`;
  return {
    pdfPath: path.join(dir, `${base}.pdf`),
    markdownPath: path.join(dir, `${base}.md`),
  };
}

function tempPath(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
}

function assertNotAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new Error("write aborted");
  }
}

/**
 * Writes both artifacts to temp files beside their targets and renames them
 * into place only once both writes succeed. On failure, or when `signal`
 * aborts before the call returns, the temps and any renamed file are removed
 * and nothing is left at the target paths by this call.
 */
export function createFileArtifactWriter(fs: ArtifactFs = nodeFs): ArtifactWriter {
  return {
    async write(target, { pdfBytes, markdown }, options = {}) {
      const { signal } = options;
      const mdTemp = tempPath(target.markdownPath);
      const pdfTemp = tempPath(target.pdfPath);
      const placed: string[] = [];
      try {
        assertNotAborted(signal);
        await fs.mkdir(path.dirname(target.markdownPath), { recursive: true });
        await fs.mkdir(path.dirname(target.pdfPath), { recursive: true });
        await fs.writeFile(mdTemp, markdown);
        await fs.writeFile(pdfTemp, pdfBytes);
        assertNotAborted(signal);
        await fs.rename(mdTemp, target.markdownPath);
        placed.push(target.markdownPath);
        assertNotAborted(signal);
        await fs.rename(pdfTemp, target.pdfPath);
        placed.push(target.pdfPath);
        // the caller may have given up while the last rename was in flight
        assertNotAborted(signal);
      } catch (error) {
        for (const file of [mdTemp, pdfTemp, ...placed]) {
          await fs.unlink(file).catch((cleanupError: unknown) => {
            log.debug({ file, error: errorMessage(cleanupError) }, "Nothing to clean up");
          });
        }
        throw new RenderFailure(`Writing report artifacts failed: ${errorMessage(error)}`, {
          pdfPath: target.pdfPath,
        });
      }
    },
  };
}
