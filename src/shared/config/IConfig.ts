/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables, files, or config services.
 */

export type BibleSourceKind = "filesystem" | "supabase";

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly corsOrigins: string[] | "*";

  // Document source
  readonly bibleSource: BibleSourceKind;
  readonly bibleDataDir: string;

  // Supabase Storage
  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;
  readonly supabaseBucket: string;

  // Validation
  validate(): void;
}
