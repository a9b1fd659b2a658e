import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StateError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { PageSnapshot } from "./types.js";
import { describeError, sha256 } from "./utils.js";

const snapshotSchema = z.object({
  version: z.literal(1),
  url: z.string(),
  fetchedAt: z.string(),
  contentHash: z.string().regex(/^[a-f0-9]{64}$/),
  text: z.string(),
  listings: z.array(z.object({ url: z.string(), title: z.string() })),
});

const settingsSchema = z
  .object({
    telegram: z.object({ chatId: z.string() }).optional(),
  })
  .passthrough();

type Settings = z.infer<typeof settingsSchema>;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * File-backed state: one snapshot file per watched URL plus `settings.json`.
 * Files are replaced through a temporary file and a rename, so a reader sees
 * either the old or the new content.
 */
export class SnapshotStore {
  constructor(
    readonly stateDir: string,
    private readonly logger: Logger,
  ) {}

  snapshotPath(url: string): string {
    return path.join(this.stateDir, `snapshot-${sha256(url).slice(0, 16)}.json`);
  }

  private get settingsPath(): string {
    return path.join(this.stateDir, "settings.json");
  }

  private async readJson(file: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    return JSON.parse(raw);
  }

  private async writeJson(file: string, data: unknown): Promise<void> {
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.stateDir, { recursive: true });
      const handle = await fs.open(tmp, "w");
      try {
        await handle.writeFile(JSON.stringify(data, null, 2), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, file);
      const dir = await fs.open(this.stateDir, "r");
      try {
        await dir.sync();
      } finally {
        await dir.close();
      }
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new StateError(`Failed to write ${file}: ${describeError(err)}`, { cause: err });
    }
  }

  /** Returns null when there is no usable snapshot, which starts a new baseline. */
  async getPreviousSnapshot(url: string): Promise<PageSnapshot | null> {
    const file = this.snapshotPath(url);
    let data: unknown;
    try {
      data = await this.readJson(file);
    } catch (err) {
      this.logger.warn(`Snapshot ${file} is unreadable, starting a new baseline: ${describeError(err)}`);
      return null;
    }
    if (data === undefined) return null;

    const parsed = snapshotSchema.safeParse(data);
    if (!parsed.success || parsed.data.url !== url) {
      this.logger.warn(`Snapshot ${file} is invalid, starting a new baseline`);
      return null;
    }
    return parsed.data;
  }

  async saveSnapshot(snapshot: PageSnapshot): Promise<void> {
    await this.writeJson(this.snapshotPath(snapshot.url), snapshot);
  }

  private async readSettings(): Promise<Settings> {
    try {
      const parsed = settingsSchema.safeParse((await this.readJson(this.settingsPath)) ?? {});
      return parsed.success ? parsed.data : {};
    } catch (err) {
      this.logger.warn(`Settings file is unreadable: ${describeError(err)}`);
      return {};
    }
  }

  async getStoredTelegramChatId(): Promise<string | null> {
    const settings = await this.readSettings();
    return settings.telegram?.chatId ?? null;
  }

  async saveTelegramChatId(chatId: string): Promise<void> {
    const settings = await this.readSettings();
    await this.writeJson(this.settingsPath, { ...settings, telegram: { chatId } });
  }
}
