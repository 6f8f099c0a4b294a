import { injectable } from "tsyringe";
import { z } from "zod";
import { BibleSourceKind, IConfig } from "./IConfig";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  BIBLE_SOURCE: z.enum(["filesystem", "supabase"]).default("filesystem"),
  BIBLE_DATA_DIR: z.string().min(1).default("./data/translations"),
  SUPABASE_URL: z.string().default(""),
  SUPABASE_ANON_KEY: z.string().default(""),
  SUPABASE_BUCKET: z.string().min(1).default("bible-translations"),
  CORS_ORIGINS: z.string().default("*"),
});

function parseOrigins(value: string): string[] | "*" {
  const origins = value
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length === 0 || origins.includes("*") ? "*" : origins;
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup
 */
@injectable()
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly corsOrigins: string[] | "*";

  readonly bibleSource: BibleSourceKind;
  readonly bibleDataDir: string;

  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;
  readonly supabaseBucket: string;

  constructor() {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ");
      throw new Error(`Invalid environment configuration: ${issues}`);
    }

    const values = parsed.data;

    this.port = values.PORT;
    this.nodeEnv = values.NODE_ENV;
    this.logLevel = values.LOG_LEVEL;
    this.corsOrigins = parseOrigins(values.CORS_ORIGINS);

    this.bibleSource = values.BIBLE_SOURCE;
    this.bibleDataDir = values.BIBLE_DATA_DIR;

    this.supabaseUrl = values.SUPABASE_URL;
    this.supabaseAnonKey = values.SUPABASE_ANON_KEY;
    this.supabaseBucket = values.SUPABASE_BUCKET;

    this.validate();
  }

  validate(): void {
    if (this.bibleSource !== "supabase") return;

    const required = [
      { name: "SUPABASE_URL", value: this.supabaseUrl },
      { name: "SUPABASE_ANON_KEY", value: this.supabaseAnonKey },
    ];

    const missing = required.filter((r) => !r.value);

    if (missing.length > 0) {
      throw new Error(
        `Missing required environment variables: ${missing.map((m) => m.name).join(", ")}`,
      );
    }
  }
}
