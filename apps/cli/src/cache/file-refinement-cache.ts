import type { LoggerMethods } from '@refinaria/logger';
import type { RefinementCache } from '@refinaria/refiner';

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string()),
});

/**
 * RefinementCache kept in one JSON file
 *
 * The file is read once on construction and rewritten after every new entry,
 * so an interrupted batch keeps what it already refined. An unreadable file
 * is logged and replaced.
 */
export class FileRefinementCache implements RefinementCache {
  static readonly FILE_NAME = 'refinements.json';

  private readonly logger: LoggerMethods;
  private readonly filePath: string;
  private readonly entries = new Map<string, string>();

  constructor(logger: LoggerMethods, cacheDir: string) {
    this.logger = logger;
    this.filePath = path.join(cacheDir, FileRefinementCache.FILE_NAME);
    this.load();
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, refinedText: string): void {
    this.entries.set(key, refinedText);
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(
      this.filePath,
      JSON.stringify({
        version: 1,
        entries: Object.fromEntries(this.entries),
      }),
      'utf8',
    );
  }

  get size(): number {
    return this.entries.size;
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      const parsed = cacheFileSchema.parse(data);
      for (const [key, text] of Object.entries(parsed.entries)) {
        this.entries.set(key, text);
      }
      this.logger.debug(
        `[FileRefinementCache] Loaded ${this.entries.size} entries from ${this.filePath}`,
      );
    } catch (error) {
      this.logger.warn(
        `[FileRefinementCache] Ignoring unreadable cache ${this.filePath}:`,
        error,
      );
    }
  }
}
