export const POS_SYSTEMS = ['loyverse', 'odoo'] as const;

export type PosSystem = (typeof POS_SYSTEMS)[number];

export type FrontMatter = Record<string, unknown>;

export type RawMenuRecord = FrontMatter & {
  slug: string;
  filePath: string;
  category: string;
  content: string;
};

export type MenuItem = {
  slug: string;
  title: string;
  price: string | number;
  priceNumeric: number;
  description: string;
  category: string;
  available: boolean;
  content: string;
  filePath: string;
};

export type PosMapping = Record<PosSystem, Record<string, string>>;

export type LoyverseItem = {
  name: string;
  price: number;
  description: string;
  category: string;
  available: boolean;
  sku: string;
  hugo_slug: string;
};

export type OdooProduct = {
  name: string;
  list_price: number;
  description: string;
  categ_id: string;
  active: boolean;
  default_code: string;
  hugo_slug: string;
};

export type PosRecordMap = {
  loyverse: LoyverseItem;
  odoo: OdooProduct;
};

export type PosMenuData = { [S in PosSystem]: Record<string, PosRecordMap[S]> };

export type CoverageRow = {
  slug: string;
  title: string;
  category: string;
  priceNumeric: number;
  mapped: Record<PosSystem, boolean>;
};

export type SkippedFile = {
  filePath: string;
  reason: string;
};
