#!/usr/bin/env node

import fs from 'fs';
import path from 'path';

import { Command, Option, program } from 'commander';

import { EXIT_CODES, ImportUtilities, formatDatasetLine } from '../import-utilities.js';
import { ImporterCliOptions, resolveImporterConfig } from '../config/importer-config.js';
import { ImporterError } from '../errors/import-errors.js';
import { DEFAULT_BUCKET_URL, DEFAULT_FHIR_SERVER_URL } from '../constants/import-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

let isShuttingDown = false;
let importUtils: ImportUtilities | null = null;
const packageJson = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
const packageJsonObject: { version: string } = JSON.parse(packageJson);
const version = packageJsonObject.version;

const cli = program.version(version)
	.description('Imports public FHIR ndjson datasets from an object store bucket into a FHIR server.')
	.addOption(new Option('--fhir-url <url>', 'Base URL of the FHIR server').env('FHIR_SERVER_URL').default(DEFAULT_FHIR_SERVER_URL))
	.addOption(new Option('--bucket-url <url>', 'Public base URL of the dataset bucket').env('BUCKET_BASE').default(DEFAULT_BUCKET_URL));

cli
	.command('list')
	.description('List datasets available in the bucket and their sizes.')
	.option('--json', 'Print datasets as JSON')
	.option('-v, --verbose', 'Enable verbose debugging mode')
	.action(async (options: { json?: boolean }, command: Command) => {
		const config = resolveImporterConfig(command.optsWithGlobals<ImporterCliOptions>());
		importUtils = new ImportUtilities(config);
		const datasets = await importUtils.listDatasets();
		if (options.json) {
			console.log(JSON.stringify(datasets, null, 2));
			return;
		}
		console.log('\nAvailable datasets:');
		datasets.forEach(dataset => console.log(formatDatasetLine(dataset)));
	});

cli
	.command('import')
	.description('Import matching, non-legacy datasets with the FHIR bulk $import operation.')
	.option('--only <substring>', 'Import only datasets whose name contains this text (case-sensitive)')
	.option('--include-legacy', 'Include legacy datasets in the run')
	.option('--no-filter-bypasses-legacy', 'Keep excluding legacy datasets even when --only names them')
	.option('-c, --concurrency <n>', 'Number of datasets imported at the same time')
	.option('--max-attempts <n>', 'Attempts per dataset when failures are retryable')
	.option('-i, --poll-interval <seconds>', 'Initial delay between job status checks')
	.option('--max-poll-interval <seconds>', 'Upper bound for the status check backoff')
	.option('--max-wait <seconds>', 'Give up on a job that has not finished after this long')
	.option('--max-error-count <n>', 'Treat a running job as failed once it reports more errors than this')
	.option('--retry-delay <seconds>', 'Delay before resubmitting a dataset after a retryable failure')
	.option('--request-timeout <seconds>', 'Timeout of each HTTP request to the FHIR server')
	.option('--preflight', 'Fail a dataset before submission when its objects have an unsupported Content-Type')
	.option('-d, --dry-run', 'Plan and build manifests without submitting any import jobs')
	.option('-v, --verbose', 'Enable verbose debugging mode')
	.action(async (_options: ImporterCliOptions, command: Command) => {
		const config = resolveImporterConfig(command.optsWithGlobals<ImporterCliOptions>());
		if (config.dryRun) {
			console.log('Dry run enabled. No import jobs will be submitted.');
		}
		console.info(`Importing from ${config.bucketUrl} into ${config.fhirUrl}`);
		importUtils = new ImportUtilities(config);
		const summary = await importUtils.importDatasets();
		process.exitCode = summary.exitCode;
	});

// Handle SIGINT signal for graceful shutdown
process.on('SIGINT', () => {
	console.info('Received SIGINT signal. Shutting down gracefully...');
	shutdown();
});

// Handle SIGTERM signal for graceful shutdown
process.on('SIGTERM', () => {
	console.info('Received SIGTERM signal. Shutting down gracefully...');
	shutdown();
});

function shutdown() {
	if (isShuttingDown) {
		console.info('Already shutting down, forcing exit...');
		process.exit(EXIT_CODES.CANCELLED);
	}
	isShuttingDown = true;

	if (!importUtils) {
		process.exit(EXIT_CODES.CANCELLED);
	}
	console.info(`${LogPrefixes.CANCEL} Cancelling import run. Jobs already accepted by the server keep running there.`);
	importUtils.cancel();
	process.exitCode = EXIT_CODES.CANCELLED;
}

program.parseAsync(process.argv).catch((error: unknown) => {
	if (error instanceof ImporterError) {
		console.error(`${LogPrefixes.FAILURE} ${error.message}`);
	} else {
		console.error(`${LogPrefixes.FAILURE} Unexpected error:`, error);
	}
	process.exitCode = EXIT_CODES.FAILURE;
});
