import { z } from 'zod';
import { DEFAULT_LAUNCH_URL, DEFAULT_OUTPUT_FILENAME, DEFAULT_PROMPT_FILENAME } from './defaults';

const FileNameSchema = z
  .string()
  .min(1)
  .refine((name) => !/[\\/]/.test(name), { message: 'must be a file name, not a path' });

export const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, { message: "must start with '.' and contain no separators" })
  .transform((ext) => ext.toLowerCase());

export const OutputConfigSchema = z.object({
  filename: FileNameSchema.default(DEFAULT_OUTPUT_FILENAME),
  promptFilename: FileNameSchema.default(DEFAULT_PROMPT_FILENAME),
});

export const LaunchConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_LAUNCH_URL),
  browser: z.boolean().default(true),
  fileManager: z.boolean().default(true),
  clipboard: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Replaces the built-in extension allowlist */
  extensions: z.array(ExtensionSchema).min(1).optional(),
  /** Extra gitignore-style patterns applied after the `.gitignore` lines */
  exclude: z.array(z.string().min(1)).default([]),
  /** Read `<root>/.gitignore` */
  gitignore: z.boolean().default(true),
  output: OutputConfigSchema.default({}),
  launch: LaunchConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LaunchConfig = z.infer<typeof LaunchConfigSchema>;
