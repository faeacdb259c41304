import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_CONFIG_PATH } from './config.js';

export interface Settings {
  configPath: string;
  outputDir: string;
  wkhtmltopdfPath: string | null;
  chromiumPath: string | null;
  printerName: string | null;
  autotest: boolean;
  port: number;
}

const ASSIGNMENT = /^\s*(?:export\s+)?([A-Za-z_][\w.-]*)\s*=\s*(.*?)\s*$/;

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}

/** Parses `KEY=value` lines. Later assignments win; comments and malformed lines are skipped. */
export function parseDotEnv(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith('#')) {
      continue;
    }
    const match = ASSIGNMENT.exec(line);
    if (match) {
      entries[match[1]] = unquote(match[2]);
    }
  }
  return entries;
}

/** Copies `.env` entries into `process.env` without overriding variables that are already set. */
export async function loadDotEnv(envPath: string = path.join(process.cwd(), '.env')): Promise<void> {
  const content = await fs.readFile(envPath, 'utf-8').catch((error: NodeJS.ErrnoException) => {
    if (error.code === 'ENOENT') {
      return null;
    }
    throw error;
  });
  if (content === null) {
    return;
  }

  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const port = Number.parseInt(env.PORT || '8765', 10);
  return {
    configPath: optional(env.PICKING_CONFIG) ?? DEFAULT_CONFIG_PATH,
    outputDir: optional(env.PICKING_OUTPUT_DIR) ?? path.join(process.cwd(), 'output'),
    wkhtmltopdfPath: optional(env.PICKING_WKHTMLTOPDF),
    chromiumPath: optional(env.PICKING_CHROMIUM_PATH),
    printerName: optional(env.PICKING_PRINTER_NAME) ?? optional(env.PRINTER_NAME),
    autotest: env.PICKING_AUTOTEST === '1',
    port: Number.isNaN(port) ? 8765 : port
  };
}
