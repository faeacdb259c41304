import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PrintError } from '../src/errors.js';
import { DocumentPrinter, buildPrintCommand, parseDefaultPrinter, parseLpstatPrinters } from '../src/printer.js';
import type { CommandRunner } from '../src/printer.js';

describe('buildPrintCommand', () => {
  it('uses lp on POSIX systems', () => {
    expect(buildPrintCommand('linux', '/tmp/picking.pdf', 'Office')).toEqual({
      file: 'lp',
      args: ['-d', 'Office', '/tmp/picking.pdf']
    });
    expect(buildPrintCommand('darwin', '/tmp/picking.pdf', null)).toEqual({ file: 'lp', args: ['/tmp/picking.pdf'] });
  });

  it('uses PowerShell on Windows and quotes its arguments', () => {
    expect(buildPrintCommand('win32', "C:\\out\\o'brien.pdf", 'Front Desk')).toEqual({
      file: 'powershell',
      args: [
        '-NoProfile',
        '-Command',
        "Start-Process -FilePath 'C:\\out\\o''brien.pdf' -Verb PrintTo -ArgumentList 'Front Desk'"
      ]
    });
  });
});

describe('lpstat parsing', () => {
  it('lists printers and the default destination', () => {
    const listing = [
      'printer Office is idle.  enabled since Mon 01 Jan 2025',
      'printer Warehouse_Laser disabled since Mon 01 Jan 2025 -',
      '\tPaused'
    ].join('\n');

    expect(parseLpstatPrinters(listing)).toEqual(['Office', 'Warehouse_Laser']);
    expect(parseDefaultPrinter('system default destination: Office\n')).toBe('Office');
    expect(parseDefaultPrinter('no system default destination\n')).toBeNull();
  });
});

describe('DocumentPrinter', () => {
  let tempDir: string;
  let pdfPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'picking-print-'));
    pdfPath = path.join(tempDir, 'picking.pdf');
    await fs.writeFile(pdfPath, '%PDF-test');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('detects the default printer and sends the PDF to it', async () => {
    const calls: Array<[string, string[]]> = [];
    const run: CommandRunner = async (file, args) => {
      calls.push([file, args]);
      return { stdout: file === 'lpstat' ? 'system default destination: Office\n' : 'request id is Office-1\n' };
    };
    const printer = new DocumentPrinter({ platform: 'linux', run });

    await printer.initialize();
    await printer.print(pdfPath);

    expect(printer.getPrinterName()).toBe('Office');
    expect(calls).toEqual([
      ['lpstat', ['-d']],
      ['lp', ['-d', 'Office', pdfPath]]
    ]);
  });

  it('skips the spooler in autotest mode', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '' }));
    const printer = new DocumentPrinter({ platform: 'linux', autotest: true, run });

    await printer.initialize();
    await printer.print(pdfPath, 'Office');

    expect(await printer.listPrinters()).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it('fails when the PDF does not exist', async () => {
    const printer = new DocumentPrinter({ platform: 'linux', autotest: true });
    const missing = path.join(tempDir, 'missing.pdf');

    await expect(printer.print(missing)).rejects.toThrow(`PDF not found: ${missing}`);
  });

  it('wraps spooler failures in a PrintError', async () => {
    const run: CommandRunner = async () => {
      throw new Error('lp: The printer or class does not exist.');
    };
    const printer = new DocumentPrinter({ platform: 'linux', printerName: 'Ghost', run });

    const result = printer.print(pdfPath);

    await expect(result).rejects.toBeInstanceOf(PrintError);
    await expect(result).rejects.toThrow(`Failed to print ${pdfPath}: lp: The printer or class does not exist.`);
  });

  it('warns instead of failing when no default printer can be detected', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const run: CommandRunner = async () => {
      throw new Error('lpstat: not found');
    };
    const printer = new DocumentPrinter({ platform: 'linux', run });

    await printer.initialize();

    expect(printer.getPrinterName()).toBeNull();
    expect(warn).toHaveBeenCalledWith('Could not detect a default printer: lpstat: not found');
  });
});
