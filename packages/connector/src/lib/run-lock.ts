/**
 * Run exclusivity
 *
 * An in-process flag covers overlapping triggers inside one process (cron tick
 * while POST /run is still going); the lock file covers a second process such
 * as `cli run` started next to `cli serve`. A lock file whose pid is gone is
 * stale and is taken over.
 */

import { mkdir, open, readFile, unlink } from "node:fs/promises";
import path from "node:path";
import { RunAlreadyInProgressError } from "./errors.js";
import { isNotFound } from "./durable-file.js";
import { setupLogger } from "./logger.js";

const logger = setupLogger("run-lock");

export interface RunLock {
  /** This process holds the lock */
  isHeld(): boolean;
  /** Some process, this one or another, is running a migration */
  isRunActive(): Promise<boolean>;
  /**
   * @throws RunAlreadyInProgressError when another run holds the lock
   */
  acquire(): Promise<void>;
  release(): Promise<void>;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export class FileRunLock implements RunLock {
  private readonly lockPath: string;
  private held = false;

  constructor(
    dataDir: string,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {
    this.lockPath = path.join(dataDir, "run.lock");
  }

  isHeld(): boolean {
    return this.held;
  }

  async isRunActive(): Promise<boolean> {
    if (this.held) {
      return true;
    }
    const owner = await this.readOwner();
    return owner !== null && owner !== process.pid && this.isAlive(owner);
  }

  async acquire(): Promise<void> {
    if (this.held) {
      throw new RunAlreadyInProgressError();
    }
    // Claim in-process before the first await so a concurrent call sees it
    this.held = true;

    try {
      await mkdir(path.dirname(this.lockPath), { recursive: true });
      await this.createLockFile();
    } catch (error) {
      this.held = false;
      throw error;
    }
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }

    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    } finally {
      this.held = false;
    }
  }

  private async createLockFile(): Promise<void> {
    try {
      await this.writeExclusive();
      return;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }

    const owner = await this.readOwner();
    if (owner !== null && owner !== process.pid && this.isAlive(owner)) {
      throw new RunAlreadyInProgressError(
        `A migration run is already in progress (pid ${owner})`
      );
    }

    logger.warn(`Taking over stale lock file (pid ${owner ?? "unknown"})`);
    await unlink(this.lockPath).catch((error: unknown) => {
      if (!isNotFound(error)) throw error;
    });

    try {
      await this.writeExclusive();
    } catch (error) {
      // Lost the takeover race to another process
      if (isAlreadyExists(error)) {
        throw new RunAlreadyInProgressError();
      }
      throw error;
    }
  }

  private async writeExclusive(): Promise<void> {
    const handle = await open(this.lockPath, "wx");
    try {
      await handle.writeFile(String(process.pid), "utf8");
    } finally {
      await handle.close();
    }
  }

  private async readOwner(): Promise<number | null> {
    try {
      const pid = parseInt((await readFile(this.lockPath, "utf8")).trim(), 10);
      return isNaN(pid) ? null : pid;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}
