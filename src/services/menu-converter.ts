import path from 'node:path';
import { MAPPING_FILE, type ConverterConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { POS_SYSTEMS, type PosSystem, type SkippedFile } from '../types/menu.js';
import { scanMenuItems } from './content-scanner.js';
import { savePosData, writeMappingReport } from './menu-writer.js';
import { loadPosMapping, loadPriorMenuData } from './pos-mapping.js';
import { convertToPosFormat, mappingCoverage } from './pos-transformer.js';

export type ConversionSummary = {
  items: number;
  skipped: SkippedFile[];
  mapped: Record<PosSystem, number>;
  files: string[];
  reportPath: string;
};

export async function runConversion(
  config: ConverterConfig,
  logger: Logger,
  now: () => Date = () => new Date()
): Promise<ConversionSummary | null> {
  logger.info('Starting menu conversion process...');

  const mapping = await loadPosMapping(config.dataDir, logger);
  await loadPriorMenuData(config.dataDir, logger);

  const { items, skipped } = await scanMenuItems(config.contentDir, logger);
  if (!items.size) {
    logger.warn('No menu items found');
    return null;
  }

  const menuItems = [...items.values()];
  const posData = convertToPosFormat(menuItems, mapping, { brandPrefix: config.brandPrefix, logger });
  const files = await savePosData(config.dataDir, posData, logger);

  const coverage = mappingCoverage(menuItems, mapping);
  const reportPath = await writeMappingReport(
    config.dataDir,
    coverage,
    {
      generatedAt: now(),
      mappingFileLabel: path.posix.join(path.basename(path.resolve(config.dataDir)), MAPPING_FILE),
    },
    logger
  );

  const mapped = { loyverse: 0, odoo: 0 };
  for (const row of coverage) {
    for (const system of POS_SYSTEMS) {
      if (row.mapped[system]) mapped[system] += 1;
    }
  }

  if (skipped.length) {
    logger.info(`Skipped ${skipped.length} content files`);
  }
  logger.info('Menu conversion completed successfully!');

  return {
    items: menuItems.length,
    skipped,
    mapped,
    files,
    reportPath,
  };
}
