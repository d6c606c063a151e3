import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

/**
 * Make an object field optional, applying the schema's inner defaults when
 * it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** YAML scalars are accepted for default context values. */
const ContextValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/** Post-create command settings. */
export const PostCreateSettingsSchema = z.object({
  /** Run the template's post_create_commands after creating a project */
  enabled: z.boolean().default(true),
  /** Kill a command after this many milliseconds (0 = no limit) */
  timeout_ms: z.number().int().min(0).default(0),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  /** Directory holding the user's projects */
  projects_dir: z.string().default(() => path.join(os.homedir(), 'projects')),
  /** Editor command used to open projects */
  editor: z.string().default(() => process.env.EDITOR || 'code'),
  /** Template used by `create` when none is given */
  default_template: z.string().default('python'),
  /** Template repository (default: templates bundled with skelly) */
  templates_dir: z.string().optional(),
  /** Default render context, e.g. author and email */
  defaults: z.preprocess((val) => val ?? {}, z.record(z.string(), ContextValueSchema)),
  post_create: withDefaults(PostCreateSettingsSchema),
});

/** Accepts an empty config file. */
export const ConfigFileSchema = z.preprocess((val) => val ?? {}, ConfigSchema);

export type PostCreateSettings = z.infer<typeof PostCreateSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
