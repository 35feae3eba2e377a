import fs from "fs/promises";
import { constants as fsConstants } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { InvalidDirectoryError } from "../utils/errors";
import { normalizeDataId } from "../utils/sanitizer";

/** `yyyy/mm/dd` of the given instant in the local time zone. */
export function datePartition(date: Date): string {
  const yyyy = String(date.getFullYear()).padStart(4, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return path.join(yyyy, mm, dd);
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Places downloaded artifacts on local disk under
 * `{directory}/{yyyy}/{mm}/{dd}/{dataId}`.
 */
export class StorageService {
  resolveOutputPath(directory: string, dataId: string, processedAt: Date): string {
    return path.join(
      directory,
      datePartition(processedAt),
      normalizeDataId(dataId),
    );
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }

  async ensureParentDirs(filePath: string): Promise<void> {
    // recursive mkdir tolerates directories created concurrently
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  }

  /**
   * Writes into a temporary sibling and renames it into place, so
   * `filePath` only ever exists with the complete contents.
   */
  async write(filePath: string, data: Buffer): Promise<void> {
    await this.ensureParentDirs(filePath);

    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${uuidv4()}.part`,
    );
    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async assertWritableDirectory(directory: string): Promise<void> {
    try {
      const stat = await fs.stat(directory);
      if (!stat.isDirectory()) {
        throw new InvalidDirectoryError(directory);
      }
      await fs.access(directory, fsConstants.W_OK);
    } catch (error) {
      if (error instanceof InvalidDirectoryError) throw error;
      throw new InvalidDirectoryError(directory, { cause: error });
    }
  }
}
