import { z } from 'zod';
import { invalidConfig } from './errors.js';

export const DEFAULT_BRAND_PREFIX = 'omg-sushi-';

export const MAPPING_FILE = 'pos-mapping.yaml';
export const PRIOR_MENU_FILE = 'menudata.yaml';

const configSchema = z.object({
  contentDir: z.string().trim().min(1),
  dataDir: z.string().trim().min(1),
  brandPrefix: z.string().trim().min(1),
  verbose: z.boolean(),
});

export type ConverterConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = Partial<ConverterConfig>;

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadConverterConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ConverterConfig {
  const parsed = configSchema.safeParse({
    contentDir: overrides.contentDir ?? (env.MENU_CONTENT_DIR || 'content'),
    dataDir: overrides.dataDir ?? (env.MENU_DATA_DIR || 'data'),
    brandPrefix: overrides.brandPrefix ?? (env.MENU_BRAND_PREFIX || DEFAULT_BRAND_PREFIX),
    verbose: overrides.verbose ?? parseFlag(env.MENU_VERBOSE),
  });
  if (!parsed.success) {
    throw invalidConfig('invalid converter configuration', parsed.error);
  }
  return parsed.data;
}
