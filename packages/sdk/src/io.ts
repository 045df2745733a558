/**
 * Crash-safe synchronous file I/O for table files
 *
 * Invariants:
 * - Writes are atomic: readers never observe a partially rewritten table
 * - Temp files always reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files read as absent, never as an error
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname, basename, join } from "node:path";
import { TableReadError, TableWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Atomically replace a file's contents using the write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Bytes to write
 * @throws TableWriteError if any step fails
 */
export function atomicWriteSync(filePath: string, content: Uint8Array): void {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fd: number | null = null;

  try {
    fd = fs.openSync(tmp, "w", 0o644);
    fs.writeFileSync(fd, content);

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      fs.fdatasyncSync(fd);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        fs.fsyncSync(fd);
      } else {
        throw err;
      }
    }

    fs.closeSync(fd);
    fd = null;

    fs.renameSync(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      syncDirectory(dir);
    }
  } catch (err) {
    if (fd !== null) {
      try {
        fs.closeSync(fd);
      } catch (closeErr) {
        logger.debug("io.close_failed", { message: String(closeErr) });
      }
    }

    try {
      fs.unlinkSync(tmp);
    } catch (unlinkErr) {
      // The temp file may never have been created
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup_failed", { message: String(unlinkErr) });
      }
    }

    throw new TableWriteError(filePath, { cause: err });
  }
}

/**
 * Fsync a directory so a completed rename survives a crash (best-effort)
 */
function syncDirectory(dir: string): void {
  let dirFd: number | null = null;
  try {
    dirFd = fs.openSync(dir, "r");
    fs.fsyncSync(dirFd);
  } catch (err) {
    // Platforms without directory fsync report one of these
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR" && code !== "EPERM") {
      logger.debug("io.dir_fsync_failed", { message: `${dir}: ${String(err)}` });
    }
  } finally {
    if (dirFd !== null) {
      fs.closeSync(dirFd);
    }
  }
}

/**
 * Read a file's raw bytes
 * @param filePath - File path to read
 * @returns File contents, or undefined if the file does not exist
 * @throws TableReadError for other read failures
 */
export function readFileIfPresent(filePath: string): Buffer | undefined {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw new TableReadError(filePath, { cause: err });
  }
}
