import { describe, expect, it } from 'vitest';
import { UsageError, parseArgs } from '../src/cliArgs.js';

describe('parseArgs', () => {
  it('reads a render request', () => {
    expect(
      parseArgs(['render', '--shipment', 'in/ship.xlsx', '--master', 'in/master.xlsx', '--out', 'out', '--print'])
    ).toEqual({
      command: 'render',
      shipmentPath: 'in/ship.xlsx',
      masterPath: 'in/master.xlsx',
      bomPath: null,
      outputDir: 'out',
      configPath: null,
      print: true,
      printerName: null
    });
  });

  it('requires both input files for render', () => {
    expect(() => parseArgs(['render', '--shipment', 'ship.xlsx'])).toThrow('render needs --shipment and --master');
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgs(['render', '--shipment', '--master', 'm.xlsx'])).toThrow('--shipment needs a value');
  });

  it('reads print and printers commands', () => {
    expect(parseArgs(['print', 'out/picking.pdf', '--printer', 'Office'])).toEqual({
      command: 'print',
      pdfPath: 'out/picking.pdf',
      printerName: 'Office'
    });
    expect(parseArgs(['printers'])).toEqual({ command: 'printers' });
  });

  it('falls back to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('rejects unknown commands and options', () => {
    expect(() => parseArgs(['publish'])).toThrow(UsageError);
    expect(() => parseArgs(['printers', '--verbose'])).toThrow('Unknown option --verbose');
  });
});
