import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import type { GridSpec } from './config.js';
import { RenderError } from './errors.js';
import { DOCUMENT_FILE } from './outputDirectory.js';
import type { OutputDirectory } from './outputDirectory.js';
import type { BackendAttempt, RenderedDocument } from './types.js';

export interface RenderBackend {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  render(markupPath: string, outputPath: string, grid: GridSpec): Promise<void>;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findExecutable(name: string, searchPath: string = process.env.PATH ?? ''): Promise<string | null> {
  const names = process.platform === 'win32' ? [`${name}.exe`, name] : [name];
  for (const dir of searchPath.split(path.delimiter).filter(Boolean)) {
    for (const candidate of names) {
      const fullPath = path.join(dir, candidate);
      if (await isExecutable(fullPath)) {
        return fullPath;
      }
    }
  }
  return null;
}

export class WkhtmltopdfBackend implements RenderBackend {
  readonly name = 'wkhtmltopdf';
  private readonly configuredPath: string | null;
  private resolved: string | null | undefined;

  constructor(binaryPath: string | null = null) {
    this.configuredPath = binaryPath;
  }

  private async binary(): Promise<string | null> {
    if (this.resolved === undefined) {
      if (this.configuredPath) {
        this.resolved = (await isExecutable(this.configuredPath)) ? this.configuredPath : null;
      } else {
        this.resolved = await findExecutable('wkhtmltopdf');
      }
    }
    return this.resolved;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.binary()) !== null;
  }

  async render(markupPath: string, outputPath: string, grid: GridSpec): Promise<void> {
    const binary = await this.binary();
    if (!binary) {
      throw new Error('wkhtmltopdf executable not found');
    }

    const args = [
      '--quiet',
      '--enable-local-file-access',
      '--print-media-type',
      '--disable-smart-shrinking',
      '--page-width',
      `${grid.sheetWidthMm}mm`,
      '--page-height',
      `${grid.sheetHeightMm}mm`,
      '--margin-top',
      '0',
      '--margin-right',
      '0',
      '--margin-bottom',
      '0',
      '--margin-left',
      '0',
      markupPath,
      outputPath
    ];

    await new Promise<void>((resolve, reject) => {
      const child = spawn(binary, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';
      child.stderr.on('data', chunk => {
        stderr += String(chunk);
      });
      child.on('error', reject);
      child.on('close', code => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`wkhtmltopdf exited with code ${code}: ${stderr.trim()}`));
        }
      });
    });
  }
}

type ChromiumModule = typeof import('playwright-core');

export class ChromiumBackend implements RenderBackend {
  readonly name = 'chromium';
  private readonly executablePath: string | null;

  constructor(executablePath: string | null = null) {
    this.executablePath = executablePath;
  }

  private async load(): Promise<ChromiumModule | null> {
    try {
      return await import('playwright-core');
    } catch {
      return null;
    }
  }

  async isAvailable(): Promise<boolean> {
    const playwright = await this.load();
    if (!playwright) {
      return false;
    }
    return isExecutable(this.executablePath ?? playwright.chromium.executablePath());
  }

  async render(markupPath: string, outputPath: string, grid: GridSpec): Promise<void> {
    const playwright = await this.load();
    if (!playwright) {
      throw new Error('playwright-core is not installed');
    }

    const browser = await playwright.chromium.launch({
      headless: true,
      ...(this.executablePath ? { executablePath: this.executablePath } : {})
    });
    try {
      const page = await browser.newPage();
      await page.goto(pathToFileURL(markupPath).href, { waitUntil: 'load' });
      await page.pdf({
        path: outputPath,
        width: `${grid.sheetWidthMm}mm`,
        height: `${grid.sheetHeightMm}mm`,
        printBackground: true,
        margin: { top: '0', right: '0', bottom: '0', left: '0' }
      });
    } finally {
      await browser.close();
    }
  }
}

export function defaultBackends(options: { wkhtmltopdfPath?: string | null; chromiumPath?: string | null } = {}): RenderBackend[] {
  return [new WkhtmltopdfBackend(options.wkhtmltopdfPath ?? null), new ChromiumBackend(options.chromiumPath ?? null)];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts the markup at `markupPath` into the run's PDF using the first backend
 * that is available and succeeds. The PDF only appears at its canonical path
 * once a backend has finished writing it.
 */
export async function renderPdf(
  markupPath: string,
  backends: RenderBackend[],
  output: OutputDirectory,
  grid: GridSpec
): Promise<RenderedDocument> {
  const attempts: BackendAttempt[] = [];

  for (const [index, backend] of backends.entries()) {
    let available: boolean;
    try {
      available = await backend.isAvailable();
    } catch (error) {
      attempts.push({ backend: backend.name, outcome: 'unavailable', message: errorMessage(error) });
      continue;
    }
    if (!available) {
      attempts.push({ backend: backend.name, outcome: 'unavailable' });
      if (index < backends.length - 1) {
        console.warn(`${backend.name} is not available; trying ${backends[index + 1].name}`);
      }
      continue;
    }

    try {
      const documentPath = await output.commit(DOCUMENT_FILE, tempPath => backend.render(markupPath, tempPath, grid));
      attempts.push({ backend: backend.name, outcome: 'succeeded' });
      return { markupPath, documentPath, backend: backend.name, attempts };
    } catch (error) {
      attempts.push({ backend: backend.name, outcome: 'failed', message: errorMessage(error) });
      if (index < backends.length - 1) {
        console.warn(`${backend.name} failed (${errorMessage(error)}); trying ${backends[index + 1].name}`);
      }
    }
  }

  const summary = attempts
    .map(attempt => `${attempt.backend}: ${attempt.outcome}${attempt.message ? ` (${attempt.message})` : ''}`)
    .join('; ');
  throw new RenderError(attempts, `No rendering backend could produce the document. ${summary || 'No backends configured.'}`);
}
