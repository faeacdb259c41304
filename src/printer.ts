import { execFile } from 'child_process';
import fs from 'fs/promises';
import { promisify } from 'util';
import { PrintError } from './errors.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

export interface PrinterOptions {
  printerName?: string | null;
  /** Skip the spooler entirely (automated runs). */
  autotest?: boolean;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

export interface PrintCommand {
  file: string;
  args: string[];
}

function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildPrintCommand(platform: NodeJS.Platform, pdfPath: string, printerName: string | null): PrintCommand {
  if (platform === 'win32') {
    const target = printerName
      ? `Start-Process -FilePath ${quotePowerShell(pdfPath)} -Verb PrintTo -ArgumentList ${quotePowerShell(printerName)}`
      : `Start-Process -FilePath ${quotePowerShell(pdfPath)} -Verb Print`;
    return { file: 'powershell', args: ['-NoProfile', '-Command', target] };
  }
  const args = printerName ? ['-d', printerName] : [];
  // No scaling options: the slots must print at their physical size.
  return { file: 'lp', args: [...args, pdfPath] };
}

export function parseLpstatPrinters(stdout: string): string[] {
  return stdout
    .split('\n')
    .map(line => line.match(/^printer (\S+)/))
    .filter((match): match is RegExpMatchArray => match !== null)
    .map(match => match[1]);
}

export function parseDefaultPrinter(stdout: string): string | null {
  const match = stdout.match(/system default destination: (\S+)/);
  return match ? match[1] : null;
}

export class DocumentPrinter {
  private printerName: string | null;
  private readonly autotest: boolean;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(options: PrinterOptions = {}) {
    this.printerName = options.printerName ?? null;
    this.autotest = options.autotest ?? false;
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? ((file, args) => execFileAsync(file, args, { encoding: 'utf8' }));
  }

  getPrinterName(): string | null {
    return this.printerName;
  }

  /** Picks the system default printer when none was configured. */
  async initialize(): Promise<void> {
    if (this.printerName || this.autotest) {
      return;
    }
    try {
      if (this.platform === 'win32') {
        const { stdout } = await this.run('powershell', [
          '-NoProfile',
          '-Command',
          'Get-Printer | Where-Object Default | Select-Object -ExpandProperty Name'
        ]);
        this.printerName = stdout.trim() || null;
        return;
      }
      const { stdout } = await this.run('lpstat', ['-d']);
      this.printerName = parseDefaultPrinter(stdout);
    } catch (error) {
      console.warn(`Could not detect a default printer: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async listPrinters(): Promise<string[]> {
    if (this.autotest) {
      return [];
    }
    try {
      if (this.platform === 'win32') {
        const { stdout } = await this.run('powershell', [
          '-NoProfile',
          '-Command',
          'Get-Printer | Select-Object -ExpandProperty Name'
        ]);
        return stdout
          .split('\n')
          .map(line => line.trim())
          .filter(Boolean);
      }
      const { stdout } = await this.run('lpstat', ['-p']);
      return parseLpstatPrinters(stdout);
    } catch (error) {
      throw new PrintError(`Could not list printers: ${error instanceof Error ? error.message : String(error)}`, [], {
        cause: error
      });
    }
  }

  async print(pdfPath: string, printerName: string | null = this.printerName): Promise<void> {
    try {
      await fs.access(pdfPath);
    } catch (error) {
      throw new PrintError(`PDF not found: ${pdfPath}`, [], { cause: error });
    }

    if (this.autotest) {
      return;
    }

    const command = buildPrintCommand(this.platform, pdfPath, printerName);
    try {
      await this.run(command.file, command.args);
    } catch (error) {
      throw new PrintError(`Failed to print ${pdfPath}: ${error instanceof Error ? error.message : String(error)}`, [], {
        cause: error
      });
    }
  }
}
