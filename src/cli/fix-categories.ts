#!/usr/bin/env node
/**
 * Category Fix CLI
 *
 * Applies a reviewed `id,category,flags` CSV to exported documents sorted
 * into category folders. Runs as a dry run unless --apply is given.
 */

import chalk from 'chalk';
import ora from 'ora';
import { logger } from '../config/index.js';
import { isThreadExportError } from '../errors.js';
import {
  readCategoryFixes,
  runCategoryFixes,
  type CategoryChange,
  type CategoryFixReport,
} from '../export/index.js';
import { parseFixCategoriesArgs, toFixCategoriesPaths } from './args.js';

function printHelp() {
  console.log(`
${chalk.bold('🗂️  Fix Categories')}

Moves exported documents between category folders and marks drafts, from a
reviewed CSV file.

${chalk.bold('Usage:')}
  thread-fix-categories <posts> <csv> [options]

${chalk.bold('Arguments:')}
  posts                Directory with one folder per category
  csv                  CSV file with id,category,flags columns

${chalk.bold('Options:')}
  --apply              Write the changes (default is a dry run)
  --verbose            Print every change
  --help, -h           Show this help message

${chalk.bold('Examples:')}
  thread-fix-categories ./content/posts fixes.csv --verbose
  thread-fix-categories ./content/posts fixes.csv --apply
`);
}

function describeChange(change: CategoryChange): string {
  return change.kind === 'draft'
    ? `   ${change.documentId}: draft is on`
    : `   ${change.documentId}: ${change.from} -> ${chalk.cyan(change.to)}`;
}

function printReport(report: CategoryFixReport) {
  console.log('\n' + chalk.bold('Categories:'));
  for (const summary of report.categories) {
    console.log(
      `  ${summary.category.padEnd(20)} ${String(summary.documents).padStart(5)} documents` +
        `  ${summary.drafts} drafts  ${summary.moved} moved`
    );
  }

  console.log('\n' + chalk.bold('Summary:'));
  console.log(`  Documents scanned:  ${report.documentsScanned}`);
  console.log(`  Drafts:             ${report.drafts}`);
  console.log(`  Moved:              ${report.moved}`);

  if (!report.applied) {
    console.log('\n' + chalk.yellow('⚠️  Dry run: nothing was written. Re-run with --apply.'));
  }
  console.log('');
}

async function main() {
  let paths: { postsPath: string; csvPath: string };
  let verbose: boolean;
  let apply: boolean;
  try {
    const args = parseFixCategoriesArgs(process.argv.slice(2));
    if (args.help) {
      printHelp();
      process.exit(0);
    }
    paths = toFixCategoriesPaths(args);
    verbose = args.verbose;
    apply = args.apply;
  } catch (error) {
    console.error(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}`));
    console.error(chalk.dim('   Run with --help for usage.\n'));
    process.exit(1);
  }

  console.log(`\n${chalk.bold('🗂️  Fix Categories')}\n`);
  console.log(`Posts: ${chalk.cyan(paths.postsPath)}`);
  console.log(`Fixes: ${chalk.cyan(paths.csvPath)}\n`);

  const changes: CategoryChange[] = [];
  const spinner = ora('Applying category fixes...').start();

  try {
    const fixes = await readCategoryFixes(paths.csvPath);
    const report = await runCategoryFixes({
      postsPath: paths.postsPath,
      fixes,
      apply,
      onChange: change => changes.push(change),
    });
    spinner.succeed(`${apply ? 'Applied' : 'Checked'} ${fixes.size} fixes`);

    if (verbose) {
      for (const change of changes) {
        console.log(describeChange(change));
      }
    }
    printReport(report);
    process.exit(0);
  } catch (error) {
    spinner.fail('Category fixes failed');
    const code = isThreadExportError(error) ? error.code : undefined;
    logger.error({ error, code }, 'Category fixes failed');
    console.error('\n' + chalk.red('❌ Category fixes failed:'), error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Unexpected CLI failure');
  process.exit(1);
});
