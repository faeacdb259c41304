import bwipjs from 'bwip-js';
import crypto from 'crypto';
import sharp from 'sharp';
import type { CodeSpec } from './config.js';
import { EncodingError } from './errors.js';
import type { OutputDirectory } from './outputDirectory.js';
import type { EncodingFailure, PickingRow } from './types.js';

export interface CodeArtifact {
  itemCode: string;
  /** Absolute path of the PNG. */
  path: string;
  /** Path relative to the output directory, as referenced from the markup. */
  relativePath: string;
}

export interface AttachResult {
  rows: PickingRow[];
  failures: EncodingFailure[];
  errors: EncodingError[];
}

const ENCODABLE = /^[\x20-\x7E]+$/;

export function slugifyCode(value: string): string {
  const slug = value
    .normalize('NFKC')
    .trim()
    .replace(/\//g, '-')
    .replace(/[^0-9A-Za-z_-]+/g, '_');
  return slug || 'code';
}

export function codeFileName(itemCode: string): string {
  const hash = crypto.createHash('sha1').update(itemCode).digest('hex').slice(0, 8);
  return `${slugifyCode(itemCode)}-${hash}.png`;
}

export class ScannableCodeGenerator {
  private readonly cache = new Map<string, CodeArtifact | EncodingError>();
  private readonly output: OutputDirectory;
  private readonly codeSpec: CodeSpec;
  private readonly sizeMm: number;

  constructor(output: OutputDirectory, codeSpec: CodeSpec, sizeMm: number) {
    this.output = output;
    this.codeSpec = codeSpec;
    this.sizeMm = sizeMm;
  }

  private mmToPixels(mm: number): number {
    return Math.max(1, Math.round((mm / 25.4) * this.codeSpec.dpi));
  }

  async encode(itemCode: string): Promise<Buffer> {
    if (!itemCode) {
      throw new EncodingError(itemCode, 'Empty item code cannot be encoded');
    }
    if (!ENCODABLE.test(itemCode)) {
      throw new EncodingError(itemCode, `Item code "${itemCode}" contains characters outside printable ASCII`);
    }

    let symbol: Buffer;
    try {
      symbol = await bwipjs.toBuffer({
        bcid: this.codeSpec.symbology,
        text: itemCode,
        scale: this.codeSpec.scale,
        includetext: false,
        backgroundcolor: 'ffffff',
        barcolor: '000000',
        ...(this.codeSpec.symbology === 'code128' ? { height: 10 } : {})
      });
    } catch (error) {
      throw new EncodingError(
        itemCode,
        `Item code "${itemCode}" cannot be encoded as ${this.codeSpec.symbology}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const size = this.mmToPixels(this.sizeMm);
    return sharp(symbol)
      .flatten({ background: '#ffffff' })
      .resize({ width: size, height: size, fit: 'contain', background: '#ffffff', kernel: 'nearest' })
      .png()
      .toBuffer();
  }

  /**
   * Returns the artifact for `itemCode`, writing it on first request within this run.
   * Failures are remembered too, so a bad code is reported once.
   */
  async generate(itemCode: string): Promise<CodeArtifact> {
    const cached = this.cache.get(itemCode);
    if (cached instanceof EncodingError) {
      throw cached;
    }
    if (cached) {
      return cached;
    }

    let image: Buffer;
    try {
      image = await this.encode(itemCode);
    } catch (error) {
      if (error instanceof EncodingError) {
        this.cache.set(itemCode, error);
      }
      throw error;
    }

    const relativePath = this.output.codeFile(codeFileName(itemCode));
    const filePath = await this.output.writeFile(relativePath, image);
    const artifact: CodeArtifact = { itemCode, path: filePath, relativePath };
    this.cache.set(itemCode, artifact);
    return artifact;
  }

  artifacts(): CodeArtifact[] {
    return [...this.cache.values()].filter((entry): entry is CodeArtifact => !(entry instanceof EncodingError));
  }

  async attachCodes(rows: PickingRow[]): Promise<AttachResult> {
    const attached: PickingRow[] = [];
    const failures = new Map<string, EncodingFailure>();
    const errors: EncodingError[] = [];

    for (const row of rows) {
      try {
        const artifact = await this.generate(row.itemCode);
        attached.push({
          ...row,
          code: { status: 'ready', itemCode: artifact.itemCode, path: artifact.path, relativePath: artifact.relativePath }
        });
      } catch (error) {
        if (!(error instanceof EncodingError)) {
          throw error;
        }
        attached.push({ ...row, code: { status: 'failed', reason: error.message } });
        const existing = failures.get(row.itemCode);
        if (existing) {
          existing.lineNos.push(row.lineNo);
        } else {
          failures.set(row.itemCode, { itemCode: row.itemCode, lineNos: [row.lineNo], reason: error.message });
          errors.push(error);
        }
      }
    }

    return { rows: attached, failures: [...failures.values()], errors };
  }
}
