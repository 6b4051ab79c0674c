import { DEFAULT_BRAND_PREFIX } from '../config.js';
import type { Logger } from '../utils/logger.js';
import type {
  CoverageRow,
  MenuItem,
  PosMapping,
  PosMenuData,
  PosRecordMap,
  PosSystem,
} from '../types/menu.js';

type Projection<S extends PosSystem> = (item: MenuItem, externalId: string) => PosRecordMap[S];

const PROJECTIONS: { [S in PosSystem]: Projection<S> } = {
  loyverse: (item, externalId) => ({
    name: item.title,
    price: item.priceNumeric,
    description: item.description,
    category: item.category,
    available: item.available,
    sku: externalId,
    hugo_slug: item.slug,
  }),
  odoo: (item, externalId) => ({
    name: item.title,
    list_price: item.priceNumeric,
    description: item.description,
    categ_id: item.category,
    active: item.available,
    default_code: externalId,
    hugo_slug: item.slug,
  }),
};

export type ResolvedId = {
  id: string;
  mapped: boolean;
};

export type TransformOptions = {
  brandPrefix?: string;
  logger?: Logger;
};

export function resolveExternalId(
  mapping: PosMapping,
  system: PosSystem,
  slug: string,
  brandPrefix = DEFAULT_BRAND_PREFIX
): ResolvedId {
  const explicit = Object.hasOwn(mapping[system], slug) ? mapping[system][slug] : undefined;
  if (explicit !== undefined) {
    return { id: explicit, mapped: true };
  }
  return { id: `${brandPrefix}${slug}`, mapped: false };
}

function projectSystem<S extends PosSystem>(
  system: S,
  items: Iterable<MenuItem>,
  mapping: PosMapping,
  { brandPrefix, logger }: TransformOptions
): Record<string, PosRecordMap[S]> {
  const project: Projection<S> = PROJECTIONS[system];
  const table: Record<string, PosRecordMap[S]> = {};
  for (const item of items) {
    const { id } = resolveExternalId(mapping, system, item.slug, brandPrefix);
    const existing = Object.hasOwn(table, id) ? table[id] : undefined;
    if (existing) {
      logger?.warn(`${system} id ${id} is assigned to both ${existing.hugo_slug} and ${item.slug}; keeping ${item.slug}`);
    }
    table[id] = project(item, id);
  }
  return table;
}

export function convertToPosFormat(
  items: Iterable<MenuItem>,
  mapping: PosMapping,
  options: TransformOptions = {}
): PosMenuData {
  const list = [...items];
  return {
    loyverse: projectSystem('loyverse', list, mapping, options),
    odoo: projectSystem('odoo', list, mapping, options),
  };
}

export function mappingCoverage(items: Iterable<MenuItem>, mapping: PosMapping): CoverageRow[] {
  return [...items].map((item) => ({
    slug: item.slug,
    title: item.title,
    category: item.category,
    priceNumeric: item.priceNumeric,
    mapped: {
      loyverse: Object.hasOwn(mapping.loyverse, item.slug),
      odoo: Object.hasOwn(mapping.odoo, item.slug),
    },
  }));
}
