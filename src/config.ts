import fs from 'fs/promises';
import path from 'path';
import { z, ZodError } from 'zod';
import { ConfigError } from './errors.js';
import type { ColumnSpec, ColumnType } from './types.js';

export const SHIPMENT_FIELDS = {
  itemCode: { type: 'text', required: true },
  quantity: { type: 'decimal', required: true },
  destination: { type: 'text', required: true },
  orderNumber: { type: 'text', required: false },
  shipDate: { type: 'text', required: false }
} as const satisfies Record<string, { type: ColumnType; required: boolean }>;

export const MASTER_FIELDS = {
  itemCode: { type: 'text', required: true },
  description: { type: 'text', required: true },
  unit: { type: 'text', required: true },
  itemType: { type: 'text', required: false },
  location: { type: 'text', required: false },
  notice: { type: 'text', required: false }
} as const satisfies Record<string, { type: ColumnType; required: boolean }>;

export const BOM_FIELDS = {
  parentItemCode: { type: 'text', required: true },
  componentItemCode: { type: 'text', required: true },
  quantityPerParent: { type: 'decimal', required: true },
  sequence: { type: 'text', required: false }
} as const satisfies Record<string, { type: ColumnType; required: boolean }>;

export type ShipmentField = keyof typeof SHIPMENT_FIELDS;
export type MasterField = keyof typeof MASTER_FIELDS;
export type BomField = keyof typeof BOM_FIELDS;

export const RENDERABLE_FIELDS = [
  'itemCode',
  'description',
  'quantity',
  'unit',
  'destination',
  'orderNumber',
  'shipDate',
  'itemType',
  'location',
  'notice'
] as const;

export type RenderableField = (typeof RENDERABLE_FIELDS)[number];

const aliasList = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : [value]))
  .pipe(z.array(z.string().min(1)).min(1));

function columnsSchema(fields: Record<string, unknown>) {
  const shape: Record<string, typeof aliasList> = {};
  for (const key of Object.keys(fields)) {
    shape[key] = aliasList;
  }
  return z.object(shape).strict();
}

export const GridSpecSchema = z
  .object({
    slotsPerPage: z.number().int().positive().default(6),
    sheetWidthMm: z.number().positive().default(210),
    sheetHeightMm: z.number().positive().default(297),
    slotHeightMm: z.number().positive().default(49.5),
    printerMarginMm: z.number().nonnegative().default(5),
    slotPaddingMm: z.number().nonnegative().default(2),
    fontSizeLabelPx: z.number().positive().default(11),
    fontSizeValuePx: z.number().positive().default(13),
    fontSizeHeaderPx: z.number().positive().default(12),
    codePosition: z.enum(['right-edge', 'left-edge']).default('right-edge'),
    codeSizeMm: z.number().positive().default(30),
    requiredFields: z.array(z.enum(RENDERABLE_FIELDS)).default(['itemCode', 'description', 'quantity'])
  })
  .strict()
  .refine(grid => grid.slotsPerPage * grid.slotHeightMm <= grid.sheetHeightMm + 0.01, {
    message: 'slotsPerPage × slotHeightMm exceeds the sheet height',
    path: ['slotHeightMm']
  })
  .refine(grid => grid.printerMarginMm * 2 < grid.sheetWidthMm, {
    message: 'printer margin leaves no printable width',
    path: ['printerMarginMm']
  });

export type GridSpec = Readonly<z.infer<typeof GridSpecSchema>>;

export const CodeSpecSchema = z
  .object({
    symbology: z.enum(['qrcode', 'code128', 'datamatrix']).default('qrcode'),
    scale: z.number().int().min(1).max(10).default(4),
    dpi: z.number().int().min(72).max(1200).default(300)
  })
  .strict();

export type CodeSpec = Readonly<z.infer<typeof CodeSpecSchema>>;

export const PipelineConfigSchema = z
  .object({
    headerScanRows: z.number().int().min(1).max(50).default(5),
    columns: z.object({
      shipment: columnsSchema(SHIPMENT_FIELDS),
      master: columnsSchema(MASTER_FIELDS),
      bom: columnsSchema(BOM_FIELDS)
    }),
    bom: z
      .object({
        path: z.string().min(1).nullable().default(null),
        keepParent: z.boolean().default(false)
      })
      .strict()
      .default({}),
    grid: GridSpecSchema.default({}),
    code: CodeSpecSchema.default({})
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface LoadedConfig {
  source: string;
  data: PipelineConfig;
}

export const DEFAULT_CONFIG_PATH = path.join('config', 'picking.json');

function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

export function parseConfig(raw: unknown, source = '(inline)'): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<LoadedConfig> {
  const source = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(source, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file not found: ${source}`, [], { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${source}`, [], { cause: error });
  }

  return { source, data: parseConfig(parsed, source) };
}

/**
 * Resolves the BOM path of the configuration against the configuration file's directory.
 */
export function resolveBomPath(config: LoadedConfig): string | null {
  const configured = config.data.bom.path;
  if (!configured) {
    return null;
  }
  return path.isAbsolute(configured) ? configured : path.resolve(path.dirname(config.source), configured);
}

export function buildColumnSpecs<K extends string>(
  fields: Record<K, { type: ColumnType; required: boolean }>,
  aliases: Record<string, string[]>
): ColumnSpec<K>[] {
  const keys = Object.keys(fields).filter((key): key is K => key in fields);
  return keys.map(key => ({
    key,
    type: fields[key].type,
    required: fields[key].required,
    aliases: aliases[key]
  }));
}
