import path from 'node:path';
import { promises as fsp } from 'node:fs';
import YAML from 'yaml';
import type { Logger } from '../utils/logger.js';
import { POS_SYSTEMS, type CoverageRow, type PosMenuData, type PosSystem } from '../types/menu.js';

export const COMBINED_YAML_FILE = 'pos-menu-data.yaml';
export const COMBINED_JSON_FILE = 'pos-menu-data.json';
export const REPORT_FILE = 'mapping-report.md';

const MAPPED = '✅';
const UNMAPPED = '❌';

export function systemFileName(system: PosSystem): string {
  return `pos-menu-${system}.yaml`;
}

export function toYaml(data: unknown): string {
  return YAML.stringify(data);
}

export function toJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export async function savePosData(dataDir: string, data: PosMenuData, logger: Logger): Promise<string[]> {
  await fsp.mkdir(dataDir, { recursive: true });
  const written: string[] = [];

  const yamlFile = path.join(dataDir, COMBINED_YAML_FILE);
  await fsp.writeFile(yamlFile, toYaml(data), 'utf8');
  logger.info(`Saved POS menu data to ${yamlFile}`);
  written.push(yamlFile);

  const jsonFile = path.join(dataDir, COMBINED_JSON_FILE);
  await fsp.writeFile(jsonFile, toJson(data), 'utf8');
  logger.info(`Saved POS menu data to ${jsonFile}`);
  written.push(jsonFile);

  for (const system of POS_SYSTEMS) {
    const systemFile = path.join(dataDir, systemFileName(system));
    await fsp.writeFile(systemFile, toYaml(data[system]), 'utf8');
    logger.info(`Saved ${system} menu data to ${systemFile}`);
    written.push(systemFile);
  }

  return written;
}

export type ReportOptions = {
  generatedAt: Date;
  mappingFileLabel: string;
};

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function renderMappingReport(rows: CoverageRow[], { generatedAt, mappingFileLabel }: ReportOptions): string {
  const lines: string[] = [];
  lines.push('# Menu Item Mapping Report', '');
  lines.push(`Generated on: ${generatedAt.toISOString()}`, '');
  lines.push(`Total menu items found: ${rows.length}`, '');
  lines.push('## Items Requiring POS Mapping', '');
  lines.push('| Slug | Title | Category | Price | Loyverse Mapped | Odoo Mapped |');
  lines.push('|------|-------|----------|-------|-----------------|-------------|');

  for (const row of rows) {
    const cells = [
      escapeCell(row.slug),
      escapeCell(row.title),
      escapeCell(row.category),
      formatPrice(row.priceNumeric),
      row.mapped.loyverse ? MAPPED : UNMAPPED,
      row.mapped.odoo ? MAPPED : UNMAPPED,
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }

  lines.push('', '## Mapping Instructions', '');
  lines.push(`1. Edit \`${mappingFileLabel}\` to add mappings for unmapped items`);
  lines.push('2. Use the format: `"menu-slug": "pos-item-id"`');
  lines.push('3. Run this script again to regenerate POS data');
  lines.push('');
  return lines.join('\n');
}

export async function writeMappingReport(
  dataDir: string,
  rows: CoverageRow[],
  options: ReportOptions,
  logger: Logger
): Promise<string> {
  await fsp.mkdir(dataDir, { recursive: true });
  const reportFile = path.join(dataDir, REPORT_FILE);
  await fsp.writeFile(reportFile, renderMappingReport(rows, options), 'utf8');
  logger.info(`Generated mapping report: ${reportFile}`);
  return reportFile;
}
