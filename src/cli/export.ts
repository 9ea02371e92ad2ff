#!/usr/bin/env node
/**
 * Thread Export CLI
 *
 * Converts an account archive into one markdown document per thread.
 */

import chalk from 'chalk';
import ora from 'ora';
import { logger } from '../config/index.js';
import { isThreadExportError } from '../errors.js';
import { runExport, type ExportOptions, type ExportReport } from '../export/index.js';
import { parseCliArgs, toExportOptions } from './args.js';

function printHelp() {
  console.log(`
${chalk.bold('🧵 Thread Export')}

Converts an account archive into markdown documents, one per thread.

${chalk.bold('Usage:')}
  thread-export <archive> <output> [options]

${chalk.bold('Arguments:')}
  archive              Archive directory (containing data/tweets.js)
  output               Output directory for documents and media

${chalk.bold('Options:')}
  --after <date>       Only posts created after this date
  --before <date>      Only posts created before this date
  --timezone <zone>    IANA time zone for dates (e.g. Europe/Madrid)
  --author <name>      Author metadata for documents
  --tag <tag>          Tag metadata for documents
  --unsafe             Embed videos with an HTML <video> tag
  --csv <file>         Also write a CSV summary of threads
  --username <name>    Account name for CSV links
  --skip-unsupported   Skip posts that cannot be parsed instead of aborting
  --help, -h           Show this help message

${chalk.bold('Examples:')}
  thread-export ./archive ./content/posts
  thread-export ./archive ./out --after 2020-01-01 --timezone Europe/Madrid --csv threads.csv
`);
}

function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

function printReport(report: ExportReport) {
  console.log('\n' + chalk.green('✅ Export Complete!') + '\n');

  console.log(chalk.bold('Summary:'));
  console.log(`  Duration:           ${formatDuration(report.durationMs)}`);
  console.log(`  Posts loaded:       ${report.recordsLoaded}`);
  console.log(`  Threads found:      ${report.threadsFound}`);
  console.log(`  Replies found:      ${report.repliesFound}`);
  console.log(`  Documents written:  ${report.documentsWritten}`);
  console.log(`  Media copied:       ${report.mediaCopied}`);
  if (report.csvRows > 0) {
    console.log(`  CSV rows:           ${report.csvRows}`);
  }

  if (report.skippedRecords.length > 0) {
    console.log('\n' + chalk.yellow(`⚠️  Skipped Posts (${report.skippedRecords.length}):`));
    for (const skipped of report.skippedRecords.slice(0, 10)) {
      console.log(`  • ${skipped.recordId}: ${skipped.reason}`);
    }
    if (report.skippedRecords.length > 10) {
      console.log(`  ... and ${report.skippedRecords.length - 10} more`);
    }
  }
  console.log('');
}

async function main() {
  let options: ExportOptions;
  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      printHelp();
      process.exit(0);
    }
    options = toExportOptions(args);
  } catch (error) {
    console.error(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}`));
    console.error(chalk.dim('   Run with --help for usage.\n'));
    process.exit(1);
  }

  console.log(`\n${chalk.bold('🧵 Thread Export')}\n`);
  console.log(`Archive: ${chalk.cyan(options.archivePath)}`);
  console.log(`Output:  ${chalk.cyan(options.outputPath)}\n`);

  const spinner = ora('Exporting threads...').start();

  try {
    const report = await runExport({
      ...options,
      onProgress: (current, total) => {
        spinner.text = `Writing documents ${current}/${total}`;
      },
    });
    spinner.succeed(`Wrote ${report.documentsWritten} documents`);
    printReport(report);
    process.exit(0);
  } catch (error) {
    spinner.fail('Export failed');
    const code = isThreadExportError(error) ? error.code : undefined;
    logger.error({ error, code }, 'Export failed');
    console.error('\n' + chalk.red('❌ Export failed:'), error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Unexpected CLI failure');
  process.exit(1);
});
