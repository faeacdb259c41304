#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import ora from 'ora';
import { parseArgs, USAGE, UsageError } from './cliArgs.js';
import type { CliCommand } from './cliArgs.js';
import { loadConfig } from './config.js';
import { defaultBackends } from './documentRenderer.js';
import { loadDotEnv, readSettings } from './env.js';
import type { Settings } from './env.js';
import { describeError, PipelineFailure } from './errors.js';
import { runPipeline } from './pipeline.js';
import type { PipelineResult } from './pipeline.js';
import { DocumentPrinter } from './printer.js';

type RenderCommand = Extract<CliCommand, { command: 'render' }>;

function showReport(result: PipelineResult): void {
  const { report } = result;
  const summary = new Table({
    style: { head: ['cyan'] },
    colWidths: [26, 60]
  });

  summary.push(
    ['Rows processed', chalk.green(String(report.rowsProcessed))],
    ['Rows excluded', report.rowsExcluded > 0 ? chalk.yellow(String(report.rowsExcluded)) : chalk.dim('0')],
    ['Code failures', report.codeFailures > 0 ? chalk.yellow(String(report.codeFailures)) : chalk.dim('0')],
    ['Pages', chalk.cyan(String(report.pageCount))],
    ['Backend', chalk.blue(report.backendUsed)],
    ['Document', report.outputs.document],
    ['Markup', report.outputs.markup]
  );
  console.log(summary.toString());

  if (report.unresolved.length > 0) {
    const unresolved = new Table({
      head: ['Line', 'Item code', 'Reason'],
      style: { head: ['yellow'] }
    });
    for (const entry of report.unresolved) {
      unresolved.push([String(entry.line), entry.itemCode, entry.reason]);
    }
    console.log(chalk.yellow('\nUnresolved references (excluded from the document):'));
    console.log(unresolved.toString());
  }

  if (report.encodingFailures.length > 0) {
    const failures = new Table({
      head: ['Item code', 'Lines', 'Reason'],
      style: { head: ['yellow'] },
      colWidths: [20, 16, 60],
      wordWrap: true
    });
    for (const failure of report.encodingFailures) {
      failures.push([failure.itemCode, failure.lineNos.join(', '), failure.reason]);
    }
    console.log(chalk.yellow('\nRows printed without a scannable code:'));
    console.log(failures.toString());
  }
}

async function choosePrinter(printer: DocumentPrinter, requested: string | null): Promise<string | null> {
  if (requested) {
    return requested;
  }
  if (printer.getPrinterName() || !process.stdin.isTTY) {
    return printer.getPrinterName();
  }

  const printers = await printer.listPrinters();
  if (printers.length === 0) {
    return null;
  }
  const { printerName } = await inquirer.prompt<{ printerName: string }>([
    {
      type: 'list',
      name: 'printerName',
      message: chalk.bold('Select a printer:'),
      choices: printers.map(name => ({ name: chalk.blue(name), value: name }))
    }
  ]);
  return printerName;
}

async function printDocument(settings: Settings, pdfPath: string, requested: string | null): Promise<void> {
  const printer = new DocumentPrinter({ printerName: settings.printerName, autotest: settings.autotest });
  await printer.initialize();
  const printerName = await choosePrinter(printer, requested);

  const spinner = ora({ text: `Sending ${pdfPath} to ${printerName ?? 'the default printer'}...`, color: 'cyan' }).start();
  try {
    await printer.print(pdfPath, printerName);
    spinner.succeed(chalk.green(`Sent to ${printerName ?? 'the default printer'}`));
  } catch (error) {
    spinner.fail(chalk.red(describeError(error)));
    throw error;
  }
}

async function render(command: RenderCommand, settings: Settings): Promise<void> {
  const spinner = ora({ text: 'Loading configuration...', color: 'cyan' }).start();

  let result: PipelineResult;
  try {
    const config = await loadConfig(command.configPath ?? settings.configPath).catch((error: unknown) => {
      throw new PipelineFailure(error);
    });
    spinner.text = 'Generating picking document...';
    result = await runPipeline(
      {
        shipmentPath: command.shipmentPath,
        masterPath: command.masterPath,
        bomPath: command.bomPath,
        outputDir: command.outputDir ?? settings.outputDir,
        config
      },
      {
        backends: defaultBackends({
          wkhtmltopdfPath: settings.wkhtmltopdfPath,
          chromiumPath: settings.chromiumPath
        })
      }
    );
  } catch (error) {
    spinner.fail(chalk.red('Generation failed'));
    if (error instanceof PipelineFailure && error.affectedRows.length > 0) {
      console.error(chalk.dim(`Affected rows: ${error.affectedRows.join(', ')}`));
    }
    throw error;
  }

  spinner.succeed(chalk.green('Picking document generated'));
  showReport(result);

  const partial = result.report.rowsExcluded > 0 || result.report.codeFailures > 0;
  console.log(
    boxen(
      `${chalk.bold(`${result.report.rowsProcessed} rows on ${result.report.pageCount} pages`)}\n${result.document.documentPath}`,
      {
        padding: 1,
        borderStyle: 'round',
        borderColor: partial ? 'yellow' : 'green',
        title: partial ? 'Completed with warnings' : 'Done'
      }
    )
  );

  if (command.print) {
    await printDocument(settings, result.document.documentPath, command.printerName);
  }
}

async function main(): Promise<void> {
  await loadDotEnv();
  const settings = readSettings();

  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(error.message));
      console.error(USAGE);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  switch (command.command) {
    case 'render':
      await render(command, settings);
      break;
    case 'print':
      await printDocument(settings, command.pdfPath, command.printerName);
      break;
    case 'printers': {
      const printer = new DocumentPrinter({ printerName: settings.printerName, autotest: settings.autotest });
      await printer.initialize();
      const printers = await printer.listPrinters();
      const defaultName = printer.getPrinterName();
      if (printers.length === 0) {
        console.log(chalk.yellow('No printers found'));
      }
      for (const name of printers) {
        console.log(name === defaultName ? `${chalk.green('●')} ${name} ${chalk.dim('(default)')}` : `  ${name}`);
      }
      break;
    }
    case 'help':
      console.log(USAGE);
      break;
  }
}

main().catch(error => {
  console.error(chalk.red(describeError(error)));
  process.exitCode = 1;
});
