import fs from 'fs/promises';
import path from 'path';
import { errnoCode, errorMessage } from '../core/errors';

export class JsonFileStore<T> {
  private filePath: string;
  private parse: (raw: unknown) => T;
  private lastSerialized: string | null = null;

  constructor(filePath: string, parse: (raw: unknown) => T) {
    this.filePath = filePath;
    this.parse = parse;
  }

  public getFilePath(): string {
    return this.filePath;
  }

  public async read(defaultValue: T): Promise<T> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') console.warn(`[JsonFileStore] Failed to read ${this.filePath}: ${errorMessage(e)}`);
      return defaultValue;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (parsed === null || parsed === undefined) return defaultValue;
      return this.parse(parsed);
    } catch (e) {
      console.warn(`[JsonFileStore] Ignoring unreadable ${this.filePath}: ${errorMessage(e)}`);
      return defaultValue;
    }
  }

  // tmp 文件 + rename 原子替换，旧文件留一份 .bak
  public async write(value: T): Promise<void> {
    const serialized = JSON.stringify(value, null, 2);
    if (serialized === this.lastSerialized) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') {
        throw e;
      }
    }
    const tmpPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmpPath, serialized, 'utf8');
    await fs.rename(tmpPath, this.filePath);
    this.lastSerialized = serialized;
  }
}
