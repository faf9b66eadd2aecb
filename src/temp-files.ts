/**
 * Temporary Filenames
 *
 * Hands out unique paths that binary-output filters write to.
 * All paths share one per-run directory, created on first use.
 */

import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export class TempFilenameFactory {
  private root: string | null = null;
  private counter = 0;

  /**
   * @param parentDir Directory the per-run directory is created in
   */
  constructor(private readonly parentDir: string = tmpdir()) {}

  /**
   * Return a fresh path. The file itself is not created.
   */
  create(prefix: string): string {
    const root = this.ensureRoot();
    const safePrefix = prefix.replace(/[^a-zA-Z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'file';
    this.counter += 1;
    return join(root, `${safePrefix}-${this.counter}`);
  }

  /**
   * Remove every file handed out so far.
   */
  cleanup(): void {
    if (this.root !== null) {
      rmSync(this.root, { recursive: true, force: true });
      this.root = null;
    }
  }

  private ensureRoot(): string {
    if (this.root === null) {
      mkdirSync(this.parentDir, { recursive: true });
      this.root = mkdtempSync(join(this.parentDir, 'rendition-'));
    }
    return this.root;
  }
}
