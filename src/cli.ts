#!/usr/bin/env node
import path from 'path';
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, ensureOutputDir, loadConfig, parseTargets } from './config';
import { configureLogging, logger } from './modules/observability';
import { AdsScraper } from './scraper';

type ScrapeOptions = {
    config: string;
    keyword?: string[];
    location?: string[];
    output?: string;
};

const program = new Command();

program
    .name('serp-ads')
    .description('Collect sponsored search ads and the contact details on their landing pages')
    .version('1.0.0');

program
    .command('scrape')
    .description('Search every keyword/location pair and export the ads to CSV')
    .option('-c, --config <path>', 'Path to config YAML', DEFAULT_CONFIG_PATH)
    .option('-k, --keyword <keyword...>', 'Search keywords (overrides config targets)')
    .option('-l, --location <location...>', 'Target locations (overrides config targets)')
    .option('-o, --output <dir>', 'Output directory (overrides output_dir)')
    .action(async (options: ScrapeOptions) => {
        try {
            const loaded = loadConfig(path.resolve(options.config));
            const config = options.output ? { ...loaded, output_dir: options.output } : loaded;
            configureLogging(config.logging);

            const targets = parseTargets({
                keywords: options.keyword ?? config.targets?.keywords ?? [],
                locations: options.location ?? config.targets?.locations ?? []
            });
            ensureOutputDir(config);

            const { records, outputPath } = await new AdsScraper(config).run(targets);
            logger.info(`Done: ${records.length} ads written to ${outputPath}`);
        } catch (e) {
            logger.error(`Fatal Error: ${e instanceof Error ? e.message : String(e)}`);
            process.exitCode = 1;
        }
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', e);
    process.exit(1);
});
