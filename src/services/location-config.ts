import YAML from 'yaml';
import { z } from 'zod';
import { invalidLocationId } from '../errors.js';

const LOCATION_ID_PATTERN = /^[A-Z_]+$/;

export type LocationInput = {
  id: string;
  name: string;
  address: string;
  city: string;
  lat: number;
  lon: number;
  phone: string;
  whatsapp: string;
  subcategories: string;
};

type OpeningSlot = { type: 'Open' | 'Close'; time: string };

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu'] as const;
const WEEKEND = ['fri', 'sat'] as const;

export function validateLocationId(id: string): string {
  if (!LOCATION_ID_PATTERN.test(id)) {
    throw invalidLocationId(id);
  }
  return id;
}

const text = z.string().trim().min(1);
// Blank strings would otherwise coerce to 0.
const coordinate = (limit: number) => text.pipe(z.coerce.number().min(-limit).max(limit));

const locationArgsSchema = z.tuple([
  z.string(),
  text,
  text,
  text,
  coordinate(90),
  coordinate(180),
  text,
  text,
  text,
]);

/** Positional arguments: id, name, address, city, lat, lon, phone, whatsapp, subcategories. */
export function parseLocationArgs(argv: string[]): LocationInput {
  validateLocationId(argv[0] ?? '');
  const [id, name, address, city, lat, lon, phone, whatsapp, subcategories] = locationArgsSchema.parse(argv);
  return { id, name, address, city, lat, lon, phone, whatsapp, subcategories };
}

export function mappingTemplateFileName(id: string): string {
  return `pos-mapping-${id.toLowerCase()}.yaml`;
}

function envRef(name: string): string {
  return `{{ env \`${name}\` }}`;
}

function openingDay(close: string): OpeningSlot[] {
  return [
    { type: 'Open', time: '11:00' },
    { type: 'Close', time: close },
  ];
}

export function renderEnvVars(location: Pick<LocationInput, 'id' | 'name'>): string {
  const { id, name } = location;
  const lower = id.toLowerCase();
  return [
    `# ${name} Location - ${id}`,
    `LOYVERSE_STORE_ID_${id}=your_${lower}_store_id_here`,
    `LOYVERSE_ACCESS_TOKEN_${id}=your_${lower}_access_token_here`,
    `ODOO_API_URL_${id}=https://${lower}-odoo.yourdomain.com`,
    `ODOO_DATABASE_${id}=omgsushi_${lower}`,
    `ODOO_COMPANY_ID_${id}=1`,
    `ODOO_PARTNER_ID_${id}=1`,
    `ODOO_POS_CONFIG_ID_${id}=1`,
    `ODOO_USER_ID_${id}=1`,
    '',
  ].join('\n');
}

export function buildLocationEntry(location: LocationInput): Record<string, unknown> {
  const { id } = location;
  const openingHours: Record<string, unknown> = { mode: 'Auto', sun: [] };
  for (const day of WEEKDAYS) openingHours[day] = openingDay('22:00');
  for (const day of WEEKEND) openingHours[day] = openingDay('23:00');

  return {
    address: location.address,
    city: location.city,
    island: 'Trinidad',
    subcategories: [location.subcategories],
    latlon: [location.lat, location.lon],
    phone: location.phone,
    whatsapp: location.whatsapp,
    orderingtables: ['Table 1', 'Table 2', 'Table 3', 'Takeaway Only'],
    delivery: {
      fooddrop: 'https://fooddropcaribbean.com/en/store/OMGSushi/your-store-id',
    },
    pos: {
      loyverse: {
        enabled: true,
        provider: 'loyverse',
        store_id: envRef(`LOYVERSE_STORE_ID_${id}`),
        access_token: envRef(`LOYVERSE_ACCESS_TOKEN_${id}`),
        webhook_secret: envRef('LOYVERSE_WEBHOOK_SECRET'),
        api_url: envRef('POS_API_URL'),
        sync_menu: true,
        auto_process_orders: true,
        fallback_to_whatsapp: true,
      },
      odoo: {
        enabled: true,
        provider: 'odoo',
        company_id: envRef(`ODOO_COMPANY_ID_${id}`),
        partner_id: envRef(`ODOO_PARTNER_ID_${id}`),
        pos_config_id: envRef(`ODOO_POS_CONFIG_ID_${id}`),
        user_id: envRef(`ODOO_USER_ID_${id}`),
        api_url: envRef(`ODOO_API_URL_${id}`),
        database: envRef(`ODOO_DATABASE_${id}`),
        sync_menu: true,
        auto_process_orders: true,
        fallback_to_whatsapp: true,
      },
    },
    opening_hours: openingHours,
  };
}

/** A single-entry YAML list, ready to paste under `data/locations.yaml`. */
export function renderLocationEntry(location: LocationInput): string {
  return YAML.stringify([buildLocationEntry(location)]);
}

// Comments only: the loader reads empty sections as empty tables.
export function renderMappingTemplate(id: string): string {
  return `# POS Mapping for ${id}
# Map menu items to POS system items

mappings:
  loyverse:
    # Example mapping - customize based on your menu
    # menu_item_slug: pos_item_id
    # "sushi-roll-california": "california-roll-001"
    # "sushi-roll-spicy-tuna": "spicy-tuna-roll-002"

  odoo:
    # Example mapping for Odoo
    # menu_item_slug: pos_product_id
    # "sushi-roll-california": 123
    # "sushi-roll-spicy-tuna": 124

# Category mappings
categories:
  loyverse:
    # "menu-category": "loyverse-category-id"

  odoo:
    # "menu-category": "odoo-category-id"
`;
}
