/**
 * @module test-helpers
 * Temporary `messages/` trees for loader tests.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Creates temp directories and removes them all on {@link TempMessages.cleanup}.
 */
export class TempMessages {
  private dirs: string[] = [];

  /** A fresh empty directory. */
  makeDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexicon-'));
    this.dirs.push(dir);
    return dir;
  }

  /**
   * Write a messages tree. Keys are `<lang>/<file>` paths relative to the
   * root; string values are written as-is, anything else as JSON.
   */
  writeTree(files: Record<string, unknown>): string {
    const root = path.join(this.makeDir(), 'messages');
    for (const [relative, content] of Object.entries(files)) {
      const target = path.join(root, relative);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    }
    fs.mkdirSync(root, { recursive: true });
    return root;
  }

  cleanup(): void {
    for (const dir of this.dirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    this.dirs = [];
  }
}
