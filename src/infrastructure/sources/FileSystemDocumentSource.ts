import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IDocumentSource } from "../../domain/translations/sources/IDocumentSource";
import { IConfig } from "../../shared/config/IConfig";

/**
 * Document source over a local directory tree
 *
 * Paths are relative to the data directory, "/"-separated and sorted.
 */
@injectable()
export class FileSystemDocumentSource implements IDocumentSource {
  private readonly root: string;

  constructor(@inject(TYPES.Config) config: IConfig) {
    this.root = path.resolve(config.bibleDataDir);
  }

  async connect(): Promise<void> {
    const stats = await fs.stat(this.root);
    if (!stats.isDirectory()) {
      throw new Error(`${this.root} is not a directory`);
    }
  }

  async listSources(): Promise<string[]> {
    const files: string[] = [];

    const walk = async (dir: string) => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.name.startsWith(".")) continue;

        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile()) {
          files.push(path.relative(this.root, fullPath).split(path.sep).join("/"));
        }
      }
    };

    await walk(this.root);
    return files.sort();
  }

  async fetch(sourcePath: string): Promise<string> {
    const fullPath = path.resolve(this.root, sourcePath);
    const relative = path.relative(this.root, fullPath);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Path escapes the data directory: ${sourcePath}`);
    }
    return fs.readFile(fullPath, "utf-8");
  }
}
