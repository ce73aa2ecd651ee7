/**
 * Test helper for managing temporary files and directories.
 * Provides automatic cleanup after tests.
 */
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Manages a temporary directory for test fixtures.
 * Call `create()` in beforeEach and `cleanup()` in afterEach.
 *
 * @example
 * ```ts
 * const tempDir = new TempDir();
 * beforeEach(async () => { await tempDir.create(); });
 * afterEach(async () => { await tempDir.cleanup(); });
 * ```
 */
export class TempDir {
  private _dir: string | null = null;

  /**
   * Creates a new temporary directory with a unique name.
   * @param prefix - Optional prefix for the temp directory name (default: "celsheet-test-")
   */
  async create(prefix: string = "celsheet-test-"): Promise<string> {
    this._dir = await mkdtemp(join(tmpdir(), prefix));
    return this._dir;
  }

  /**
   * @throws Error if create() hasn't been called
   */
  get dir(): string {
    if (!this._dir) {
      throw new Error("TempDir not created. Call create() first.");
    }
    return this._dir;
  }

  path(...relativePath: string[]): string {
    return join(this.dir, ...relativePath);
  }

  async write(relativePath: string, content: string): Promise<string> {
    const filePath = this.path(relativePath);
    await writeFile(filePath, content, "utf-8");
    return filePath;
  }

  async read(relativePath: string): Promise<string> {
    return await readFile(this.path(relativePath), "utf-8");
  }

  exists(relativePath: string): boolean {
    return existsSync(this.path(relativePath));
  }

  /**
   * Removes the temporary directory and all its contents.
   * Safe to call even if create() wasn't called.
   */
  async cleanup(): Promise<void> {
    if (this._dir) {
      await rm(this._dir, { recursive: true, force: true });
      this._dir = null;
    }
  }
}
