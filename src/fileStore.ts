import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { Logger, logger as rootLogger } from "./logger";

/**
 * One JSON document on disk, validated on read and cached in memory.
 * Writes go through a temp file and a rename so a crash leaves either the
 * old or the new document, never half of one.
 */
export class JsonFileStore<T> {
  private cache: T | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly empty: () => T,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child("store");
  }

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<T> {
    if (this.cache !== null) {
      return this.cache;
    }
    this.cache = await this.load();
    return this.cache;
  }

  async refresh(): Promise<T> {
    this.cache = await this.load();
    return this.cache;
  }

  async write(value: T): Promise<void> {
    const bytes = Buffer.from(JSON.stringify(value, null, 2), "utf8");
    await this.atomicWrite(bytes);
    this.cache = value;
  }

  async update(mutate: (current: T) => T): Promise<T> {
    const next = mutate(await this.read());
    await this.write(next);
    return next;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.stat(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async load(): Promise<T> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch {
      return this.empty();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      this.logger.warn(`ignoring unreadable file ${this.filePath}`, err);
      return this.empty();
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        `ignoring invalid file ${this.filePath}`,
        parsed.error.issues[0]?.message
      );
      return this.empty();
    }
    return parsed.data;
  }

  private async atomicWrite(bytes: Uint8Array): Promise<void> {
    const folder = path.dirname(this.filePath);
    const tempPath = `${this.filePath}.tmp`;
    const backupPath = `${this.filePath}.bak`;
    await fs.mkdir(folder, { recursive: true });
    try {
      await fs.writeFile(tempPath, bytes);
      if (await this.exists()) {
        try {
          await fs.copyFile(this.filePath, backupPath);
        } catch (err) {
          this.logger.debug(`could not back up ${this.filePath}`, err);
        }
      }
      try {
        await fs.rename(tempPath, this.filePath);
      } catch (err) {
        this.logger.debug("rename failed, copying instead", err);
        await fs.copyFile(tempPath, this.filePath);
        await fs.unlink(tempPath);
      }
    } catch (err) {
      this.logger.error(`failed to write storage file ${this.filePath}`, err);
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }
}
