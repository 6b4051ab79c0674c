import path from 'node:path';
import { z } from 'zod';
import { MAPPING_FILE, PRIOR_MENU_FILE } from '../config.js';
import { invalidMapping } from '../errors.js';
import { describeError } from '../utils/describe-error.js';
import { readTextIfExists } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { parseYaml } from '../utils/yaml.js';
import { POS_SYSTEMS, type PosMapping, type PosSystem } from '../types/menu.js';

const externalIdSchema = z.union([
  z.string().trim().min(1),
  z.number().finite().transform((value) => String(value)),
]);

// A section holding only comments parses as null.
const itemTableSchema = z.record(externalIdSchema).nullish();

const systemTablesSchema = z
  .object({
    loyverse: itemTableSchema,
    odoo: itemTableSchema,
  })
  .partial()
  .nullish();

const globalSystemSchema = z.object({ items: itemTableSchema }).partial().nullish();

const mappingFileSchema = z
  .object({
    global: z
      .object({
        loyverse: globalSystemSchema,
        odoo: globalSystemSchema,
      })
      .partial()
      .nullish(),
    mappings: systemTablesSchema,
  })
  .partial()
  .nullish();

export function emptyMapping(): PosMapping {
  return { loyverse: {}, odoo: {} };
}

export function normalizePosMapping(raw: unknown, source = MAPPING_FILE): PosMapping {
  const parsed = mappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidMapping(source, parsed.error);
  }

  const mapping = emptyMapping();
  const file = parsed.data;
  if (!file) return mapping;

  for (const system of POS_SYSTEMS) {
    Object.assign(mapping[system], file.mappings?.[system] ?? {}, file.global?.[system]?.items ?? {});
  }
  return mapping;
}

export async function loadPosMapping(dataDir: string, logger: Logger): Promise<PosMapping> {
  const mappingFile = path.join(dataDir, MAPPING_FILE);
  const text = await readTextIfExists(mappingFile);
  if (text === null) {
    logger.warn(`POS mapping file not found: ${mappingFile}`);
    return emptyMapping();
  }

  let raw: unknown;
  try {
    const parsed = parseYaml(text);
    raw = parsed.data;
    logYamlWarnings(logger, mappingFile, parsed.warnings);
  } catch (error) {
    throw invalidMapping(mappingFile, error);
  }

  const mapping = normalizePosMapping(raw, mappingFile);
  const counts = POS_SYSTEMS.map((system) => `${system}=${countMapped(mapping, system)}`).join(', ');
  logger.info(`Loaded POS mapping from ${mappingFile} (${counts})`);
  return mapping;
}

function logYamlWarnings(logger: Logger, file: string, warnings: string[]): void {
  for (const warning of warnings) {
    logger.warn(`YAML warning in ${file}: ${warning}`);
  }
}

export function countMapped(mapping: PosMapping, system: PosSystem): number {
  return Object.keys(mapping[system]).length;
}

/** Reads the previous menu data file. The pipeline does not merge it into the output. */
export async function loadPriorMenuData(dataDir: string, logger: Logger): Promise<unknown> {
  const menuFile = path.join(dataDir, PRIOR_MENU_FILE);
  const text = await readTextIfExists(menuFile);
  if (text === null) return null;

  try {
    const parsed = parseYaml(text);
    logYamlWarnings(logger, menuFile, parsed.warnings);
    const data = parsed.data ?? {};
    logger.info(`Loaded existing menu data from ${menuFile}`);
    return data;
  } catch (error) {
    logger.warn(`Ignoring unreadable menu data ${menuFile}: ${describeError(error)}`);
    return null;
  }
}
