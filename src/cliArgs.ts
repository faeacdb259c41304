export type CliCommand =
  | {
      command: 'render';
      shipmentPath: string;
      masterPath: string;
      bomPath: string | null;
      outputDir: string | null;
      configPath: string | null;
      print: boolean;
      printerName: string | null;
    }
  | { command: 'print'; pdfPath: string; printerName: string | null }
  | { command: 'printers' }
  | { command: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage:
  picking render --shipment <file> --master <file> [--bom <file>] [--out <dir>]
                 [--config <file>] [--print] [--printer <name>]
  picking print <pdf> [--printer <name>]
  picking printers
  picking help`;

const VALUE_FLAGS = new Set(['--shipment', '--master', '--bom', '--out', '--config', '--printer']);

export function parseArgs(argv: string[]): CliCommand {
  const [command = 'help', ...rest] = argv;
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    const next = rest[i + 1];
    if (VALUE_FLAGS.has(arg)) {
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`${arg} needs a value`);
      }
      values.set(arg, next);
      i += 1;
    } else if (arg === '--print') {
      switches.add(arg);
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  switch (command) {
    case 'render': {
      const shipmentPath = values.get('--shipment');
      const masterPath = values.get('--master');
      if (!shipmentPath || !masterPath) {
        throw new UsageError('render needs --shipment and --master');
      }
      return {
        command: 'render',
        shipmentPath,
        masterPath,
        bomPath: values.get('--bom') ?? null,
        outputDir: values.get('--out') ?? null,
        configPath: values.get('--config') ?? null,
        print: switches.has('--print'),
        printerName: values.get('--printer') ?? null
      };
    }
    case 'print': {
      const [pdfPath] = positional;
      if (!pdfPath) {
        throw new UsageError('print needs the path of a PDF');
      }
      return { command: 'print', pdfPath, printerName: values.get('--printer') ?? null };
    }
    case 'printers':
      return { command: 'printers' };
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}
