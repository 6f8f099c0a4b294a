import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IDocumentSource } from "../../domain/translations/sources/IDocumentSource";
import { IConfig } from "../../shared/config/IConfig";
import { SupabaseClient } from "../storage/SupabaseClient";

const PAGE_SIZE = 100;

/**
 * Document source over a Supabase Storage bucket
 *
 * Folders ("english/", "romanian/") are walked recursively.
 */
@injectable()
export class SupabaseStorageDocumentSource implements IDocumentSource {
  private readonly bucket: string;

  constructor(
    @inject(TYPES.SupabaseClient) private readonly supabase: SupabaseClient,
    @inject(TYPES.Config) config: IConfig,
  ) {
    this.bucket = config.supabaseBucket;
  }

  private storage() {
    return this.supabase.getClient().storage.from(this.bucket);
  }

  async connect(): Promise<void> {
    const { error } = await this.storage().list("", { limit: 1 });
    if (error) {
      throw new Error(`Cannot access bucket ${this.bucket}: ${error.message}`);
    }
  }

  async listSources(): Promise<string[]> {
    const files: string[] = [];

    const walk = async (prefix: string) => {
      for (let offset = 0; ; offset += PAGE_SIZE) {
        const { data, error } = await this.storage().list(prefix, {
          limit: PAGE_SIZE,
          offset,
          sortBy: { column: "name", order: "asc" },
        });
        if (error) {
          throw new Error(`Failed to list ${prefix || "/"}: ${error.message}`);
        }

        const items = data ?? [];
        for (const item of items) {
          const itemPath = prefix ? `${prefix}/${item.name}` : item.name;
          // Folders come back without an id
          if (item.id) {
            files.push(itemPath);
          } else {
            await walk(itemPath);
          }
        }

        if (items.length < PAGE_SIZE) return;
      }
    };

    await walk("");
    return files;
  }

  async fetch(path: string): Promise<string> {
    const { data, error } = await this.storage().download(path);
    if (error || !data) {
      throw new Error(`Failed to download ${path}: ${error?.message ?? "no data"}`);
    }
    return data.text();
  }
}
