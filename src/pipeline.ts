import { buildBomLookup, expandBom } from './bomExpander.js';
import { resolveBomPath } from './config.js';
import type { LoadedConfig } from './config.js';
import { defaultBackends, renderPdf } from './documentRenderer.js';
import type { RenderBackend } from './documentRenderer.js';
import { buildMasterLookup, joinWithMaster } from './enrichment.js';
import { PipelineFailure } from './errors.js';
import type { EncodingError, UnresolvedReferenceError } from './errors.js';
import { MARKUP_FILE, OutputDirectory, REPORT_FILE } from './outputDirectory.js';
import { paginate } from './paginator.js';
import { ScannableCodeGenerator } from './scannableCode.js';
import { loadBom, loadItemMaster, loadShipment } from './spreadsheetLoader.js';
import { assertRenderable, renderDocument } from './templateRenderer.js';
import type { Page, PickingRow, RenderedDocument, RunReport } from './types.js';

export interface PipelineRequest {
  shipmentPath: string;
  masterPath: string;
  /** Overrides `bom.path` of the configuration. */
  bomPath?: string | null;
  outputDir: string;
  config: LoadedConfig;
}

export interface PipelineDeps {
  backends?: RenderBackend[];
  now?: () => Date;
}

export interface PipelineResult {
  rows: PickingRow[];
  pages: Page[];
  report: RunReport;
  document: RenderedDocument;
  /** Row-level problems that did not stop the run. */
  issues: Array<UnresolvedReferenceError | EncodingError>;
}

/**
 * Runs one generation request end to end. Every call owns its own code cache and
 * output bookkeeping, so concurrent callers must not share anything but the config.
 * On any fatal error the output directory is put back the way the run found it
 * and a single PipelineFailure is thrown.
 */
export async function runPipeline(request: PipelineRequest, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const output = new OutputDirectory(request.outputDir);
  const config = request.config.data;
  const now = deps.now ?? (() => new Date());

  try {
    const shipment = await loadShipment(request.shipmentPath, config);
    const master = buildMasterLookup(await loadItemMaster(request.masterPath, config));

    const bomPath = request.bomPath ?? resolveBomPath(request.config);
    const bomLookup = bomPath ? buildBomLookup(await loadBom(bomPath, config)) : null;
    const expanded = expandBom(shipment, bomLookup, { keepParent: config.bom.keepParent });

    const joined = joinWithMaster(expanded, master);
    // Checked up front so a malformed row fails the run before anything is written.
    for (const row of joined.rows) {
      assertRenderable(row, config.grid);
    }

    const generator = new ScannableCodeGenerator(output, config.code, config.grid.codeSizeMm);
    const attached = await generator.attachCodes(joined.rows);
    const pages = paginate(attached.rows, config.grid.slotsPerPage);

    const generatedAt = now();
    const markup = renderDocument(pages, config.grid, {
      title: `Picking list ${generatedAt.toISOString().slice(0, 10)}`,
      generatedAt
    });
    const markupPath = await output.writeFile(MARKUP_FILE, markup);
    const document = await renderPdf(
      markupPath,
      deps.backends ?? defaultBackends(),
      output,
      config.grid
    );

    const report: RunReport = {
      rowsProcessed: attached.rows.length,
      rowsExcluded: joined.unresolved.length,
      codeFailures: attached.rows.filter(row => row.code.status === 'failed').length,
      backendUsed: document.backend,
      pageCount: pages.length,
      unresolved: joined.unresolved,
      encodingFailures: attached.failures,
      outputs: {
        document: document.documentPath,
        markup: markupPath,
        report: output.reportPath,
        codes: generator.artifacts().map(artifact => artifact.path)
      }
    };
    await output.writeFile(REPORT_FILE, `${JSON.stringify(report, null, 2)}\n`);
    await output.finalize();

    return {
      rows: attached.rows,
      pages,
      report,
      document,
      issues: [...joined.errors, ...attached.errors]
    };
  } catch (error) {
    await output.rollback().catch(rollbackError => {
      console.warn('Could not remove partial output:', rollbackError);
    });
    throw new PipelineFailure(error);
  }
}
