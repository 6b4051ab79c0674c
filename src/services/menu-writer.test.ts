import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import YAML from 'yaml';
import { createTempDir, removeDir, testLogger } from '../test/helpers.js';
import type { CoverageRow, PosMenuData } from '../types/menu.js';
import { renderMappingReport, savePosData, toJson, toYaml, writeMappingReport } from './menu-writer.js';
import { convertToPosFormat } from './pos-transformer.js';

const rows: CoverageRow[] = [
  {
    slug: 'spicy-tuna',
    title: 'Spicy Tuna Roll',
    category: 'rolls',
    priceNumeric: 12.5,
    mapped: { loyverse: false, odoo: true },
  },
  {
    slug: 'miso',
    title: 'Miso | Soup',
    category: 'uncategorized',
    priceNumeric: 4,
    mapped: { loyverse: true, odoo: false },
  },
];

const reportOptions = {
  generatedAt: new Date('2026-01-02T03:04:05.000Z'),
  mappingFileLabel: 'data/pos-mapping.yaml',
};

const sampleData: PosMenuData = convertToPosFormat(
  [
    {
      slug: 'spicy-tuna',
      title: 'Spicy Tuna Roll',
      price: '$12.50',
      priceNumeric: 12.5,
      description: 'Tuna: chili mayo # house',
      category: 'rolls',
      available: true,
      content: '',
      filePath: 'content/rolls/spicy-tuna.md',
    },
  ],
  { loyverse: {}, odoo: { 'spicy-tuna': '124' } }
);

describe('renderMappingReport', () => {
  it('renders one row per item with mapping glyphs', () => {
    expect(renderMappingReport(rows, reportOptions)).toBe(
      [
        '# Menu Item Mapping Report',
        '',
        'Generated on: 2026-01-02T03:04:05.000Z',
        '',
        'Total menu items found: 2',
        '',
        '## Items Requiring POS Mapping',
        '',
        '| Slug | Title | Category | Price | Loyverse Mapped | Odoo Mapped |',
        '|------|-------|----------|-------|-----------------|-------------|',
        '| spicy-tuna | Spicy Tuna Roll | rolls | $12.50 | ❌ | ✅ |',
        '| miso | Miso \\| Soup | uncategorized | $4.00 | ✅ | ❌ |',
        '',
        '## Mapping Instructions',
        '',
        '1. Edit `data/pos-mapping.yaml` to add mappings for unmapped items',
        '2. Use the format: `"menu-slug": "pos-item-id"`',
        '3. Run this script again to regenerate POS data',
        '',
      ].join('\n')
    );
  });
});

describe('serialization', () => {
  it('parses the YAML and JSON dumps back to the same data', () => {
    expect(YAML.parse(toYaml(sampleData))).toEqual(sampleData);
    expect(JSON.parse(toJson(sampleData))).toEqual(sampleData);
  });

  it('round-trips arbitrary tables through both formats', () => {
    const record = fc.record({
      name: fc.string(),
      price: fc.integer({ min: 0, max: 10_000_000 }).map((cents) => cents / 100),
      description: fc.string(),
      category: fc.string(),
      available: fc.boolean(),
    });
    const table = fc.dictionary(fc.stringMatching(/^[a-z][a-z0-9-]{0,20}$/), record);

    fc.assert(
      fc.property(table, (data) => {
        expect(YAML.parse(toYaml(data))).toEqual(JSON.parse(toJson(data)));
      })
    );
  });
});

describe('file output', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = path.join(await createTempDir(), 'data');
  });

  afterEach(async () => {
    await removeDir(path.dirname(dataDir));
  });

  it('writes the combined and per-system files', async () => {
    const written = await savePosData(dataDir, sampleData, testLogger());

    expect(written.map((file) => path.basename(file))).toEqual([
      'pos-menu-data.yaml',
      'pos-menu-data.json',
      'pos-menu-loyverse.yaml',
      'pos-menu-odoo.yaml',
    ]);
    expect(JSON.parse(await fsp.readFile(path.join(dataDir, 'pos-menu-data.json'), 'utf8'))).toEqual(sampleData);
    expect(YAML.parse(await fsp.readFile(path.join(dataDir, 'pos-menu-odoo.yaml'), 'utf8'))).toEqual(sampleData.odoo);
  });

  it('overwrites previous output', async () => {
    await fsp.mkdir(dataDir, { recursive: true });
    await fsp.writeFile(path.join(dataDir, 'pos-menu-data.json'), '{"stale": true}', 'utf8');

    await savePosData(dataDir, sampleData, testLogger());

    expect(JSON.parse(await fsp.readFile(path.join(dataDir, 'pos-menu-data.json'), 'utf8'))).toEqual(sampleData);
  });

  it('writes the mapping report', async () => {
    const reportFile = await writeMappingReport(dataDir, rows, reportOptions, testLogger());

    expect(reportFile).toBe(path.join(dataDir, 'mapping-report.md'));
    expect(await fsp.readFile(reportFile, 'utf8')).toBe(renderMappingReport(rows, reportOptions));
  });
});
