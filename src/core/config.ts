import { z } from "zod";

export const DEFAULT_CONFIG_FILENAME = ".licenselint.yaml";

export const LintConfigSchema = z
  .object({
    license_dir: z.string().min(1).default("LICENSES"),
    manifest_filename: z.string().min(1).default("REUSE.toml"),
    dep5_path: z.string().min(1).default(".reuse/dep5"),

    multiprocessing: z.boolean().default(true),
    jobs: z.number().int().positive().optional(),

    // Bytes of each file searched for tags, unless the file declares a snippet.
    header_bytes: z.number().int().positive().default(4096),
    merge_copyrights: z.boolean().default(false),

    include_submodules: z.boolean().default(false),
    include_meson_subprojects: z.boolean().default(false),
    vcs: z.enum(["auto", "git", "none"]).default("auto"),
  })
  .strict();

export type LintConfig = z.infer<typeof LintConfigSchema>;

export function defaultLintConfig(): LintConfig {
  return LintConfigSchema.parse({});
}
