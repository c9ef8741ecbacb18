import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { sleep } from '../utils/timing.js';

export const PARTIAL_SUFFIX = '.crdownload';

export interface WaitOptions {
  timeoutMs: number;
  pollMs: number;
  extension: string;
  /** names present before the download was triggered */
  ignore?: ReadonlySet<string>;
  signal?: AbortSignal;
}

/** Per-run download directory. Removed when the run ends. */
export class StagingArea {
  private constructor(public readonly dir: string) {}

  static async create(parent: string = tmpdir()): Promise<StagingArea> {
    return new StagingArea(await mkdtemp(join(parent, 'form-runner-staging-')));
  }

  async list(): Promise<string[]> {
    return readdir(this.dir);
  }

  async snapshot(): Promise<Set<string>> {
    return new Set(await this.list());
  }

  /**
   * Poll until a completed file with `extension` appears and nothing is
   * still being written. Returns its path, or null on timeout.
   */
  async waitForDocument(options: WaitOptions): Promise<string | null> {
    const deadline = Date.now() + options.timeoutMs;
    const wanted = options.extension.toLowerCase();

    for (;;) {
      const names = await this.list();
      const inFlight = names.some((name) => name.endsWith(PARTIAL_SUFFIX));
      const done = names.find(
        (name) => name.toLowerCase().endsWith(wanted) && !options.ignore?.has(name),
      );
      if (done && !inFlight) return join(this.dir, done);

      if (Date.now() >= deadline) return null;
      await sleep(Math.min(options.pollMs, Math.max(0, deadline - Date.now())), options.signal);
    }
  }

  async read(path: string): Promise<Buffer> {
    return readFile(path);
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}
