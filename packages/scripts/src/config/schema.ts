/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const configSchema = z.object({
  logging: z
    .object({
      // stderr is shared with the scripts' own messages, so stay quiet by default
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  output: z
    .object({
      /** Directory that -save writes into */
      saveDir: z.string().min(1).default('.'),
    })
    .default({}),
});

export type ScriptsConfig = z.infer<typeof configSchema>;

/**
 * Environment variable → config path
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  DEVSIM_SAVE_DIR: 'output.saveDir',
};
