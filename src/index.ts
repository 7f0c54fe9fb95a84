#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import ora from 'ora';
import { buildConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { getErrorMessage, InvalidInputError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { extract } from './paginationExtractor.js';
import { resolveQuery, resolveRequestTemplate } from './queryResolver.js';
import { enrichSalesCounts } from './salesEnricher.js';
import { loadCatalogue } from './scrapers/wildberries/catalogue.js';
import { WildberriesClient } from './scrapers/wildberries/client.js';
import { writeWorkbook } from './spreadsheetWriter.js';
import type { CatalogueEntry, Query, QueryMode, ScraperConfig } from './types.js';

async function promptForQuery(): Promise<Query> {
  const { mode } = await inquirer.prompt<{ mode: QueryMode }>([
    {
      type: 'list',
      name: 'mode',
      message: chalk.bold('What should be collected?'),
      choices: [
        { name: 'A whole category', value: 'category' },
        { name: 'Search results for a keyword', value: 'keyword' }
      ]
    }
  ]);

  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message: mode === 'category' ? 'Category name or link:' : 'Search keyword:',
      validate: (input: string) => input.trim().length > 0 || 'Please enter a value'
    }
  ]);

  return resolveQuery(mode, value);
}

function showBanner(): void {
  console.log(boxen(chalk.bold('Wildberries catalog scraper'), {
    padding: { left: 2, right: 2, top: 0, bottom: 0 },
    borderStyle: 'round',
    borderColor: 'magenta'
  }));
}

async function run(config: ScraperConfig): Promise<void> {
  const logger = createConsoleLogger(config.verbose);
  const client = new WildberriesClient(config);

  const query = config.mode && config.value !== undefined
    ? resolveQuery(config.mode, config.value)
    : await promptForQuery();

  let catalogue: CatalogueEntry[] | undefined;
  if (query.mode === 'category') {
    const spinner = ora('Loading catalogue...').start();
    try {
      catalogue = await loadCatalogue(client, config.cacheDir, new Date(), logger);
      spinner.succeed(`Catalogue loaded (${catalogue.length} categories)`);
    } catch (error) {
      spinner.fail('Could not load the catalogue');
      throw error;
    }
  }
  const template = resolveRequestTemplate(query, { ...config, catalogue });
  if (query.mode === 'category') {
    console.log(chalk.green(`Found category: ${template.label}`));
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort();
    console.log(chalk.yellow('\nStopping; collected data will still be saved. Press Ctrl+C again to quit now.'));
  };
  process.on('SIGINT', onInterrupt);

  try {
    const spinner = ora('Loading page 1...').start();
    const result = await extract(template, (request, signal) => client.fetchPage(request, signal), {
      maxPages: config.maxPages,
      maxAttempts: config.maxAttempts,
      retryDelayMs: config.retryDelayMs,
      requestDelayMs: config.requestDelayMs,
      signal: controller.signal,
      logger,
      onPage: summary => {
        spinner.text = `Page ${summary.pageNumber}: ${summary.added} new item(s), ${summary.total} total`;
      }
    });
    spinner.succeed(`Collected ${result.records.length} item(s) from ${result.pagesFetched} page(s)`);
    if (result.warning) {
      logger.warn(result.warning.message);
    }

    let records = result.records;
    let salesMissing = records.length;
    if (config.fetchSales && records.length > 0 && !controller.signal.aborted) {
      const salesSpinner = ora('Loading sales data...').start();
      const enriched = await enrichSalesCounts(
        records,
        (itemId, signal) => client.fetchOrderQuantity(itemId, signal),
        {
          delayMs: config.salesDelayMs,
          signal: controller.signal,
          logger,
          onProgress: (done, total) => {
            salesSpinner.text = `Loading sales data ${done}/${total}`;
          }
        }
      );
      records = enriched.records;
      salesMissing = enriched.missing;
      if (enriched.interrupted) {
        salesSpinner.warn('Sales data loading interrupted');
      } else {
        salesSpinner.succeed('Sales data loaded');
      }
    }

    if (records.length === 0) {
      logger.warn('Nothing to save.');
      return;
    }

    const outputPath = await writeWorkbook(records, { outputDir: config.outputDir, label: template.label });

    const table = new Table({ style: { head: ['cyan'] }, colWidths: [22, 50] });
    table.push(
      ['Query', `${query.mode}: ${query.value}`],
      ['Pages fetched', String(result.pagesFetched)],
      ['Items saved', chalk.green(String(records.length))],
      ['Skipped (malformed)', result.malformed.length > 0 ? chalk.yellow(String(result.malformed.length)) : '0'],
      ['Without sales data', String(salesMissing)],
      ['Complete', result.warning ? chalk.yellow(`no (${result.warning.reason})`) : chalk.green('yes')]
    );
    console.log(table.toString());
    console.log(chalk.green(`✓ Data saved to ${outputPath}`));
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function main(): Promise<void> {
  await loadDotEnv();
  const config = buildConfig();
  showBanner();
  try {
    await run(config);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main().catch(error => {
  console.error(chalk.red('Scraper failed:'), getErrorMessage(error));
  process.exitCode = 1;
});
