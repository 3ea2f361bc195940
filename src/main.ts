#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: run one or more sources from the command line.
 *
 *   au-job-scraper                         all sources, regular run
 *   au-job-scraper -s seek prosple         selected sources
 *   au-job-scraper --initial -o jobs.json  backfill run, results to a file
 *
 * Sources run one after another. Every URL collected so far is added to the
 * skip set of the next source, so a posting syndicated to two boards under
 * the same URL is only fetched once.
 *
 * LOGGING
 * ───────
 *  • log.txt is truncated at the start of every run.
 *  • All stdout/stderr is mirrored to log.txt in real time.
 *
 * EXIT CODES
 * ──────────
 *  0  every selected source finished (individual page failures are fine)
 *  1  invalid configuration, or a source could not start its session
 */

import 'dotenv/config';
import * as fs from 'fs/promises';
import { Command } from 'commander';
import { log, LogLevel } from 'crawlee';
import { loadScraperSettings, type ScraperSettings } from './config/settings.js';
import { scrape } from './scraper.js';
import { ALL_SOURCES, isSourceName, type JobPosting, type SourceName } from './sources/types.js';
import { ConfigurationError, SessionError, errorMessage } from './utils/errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';
import { createRunContext, type RunContext } from './utils/runContext.js';

interface CliOptions {
    source?: string[];
    initial?: boolean;
    output?: string;
    verbose?: boolean;
}

interface SourceReport {
    postings: number;
    batches: number;
    durationMs: number;
    error?: string;
}

interface RunReport extends RunContext {
    finishedAt: string;
    results: Partial<Record<SourceName, SourceReport>>;
    postings: JobPosting[];
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function parseSources(names: string[] | undefined): SourceName[] {
    if (!names || names.length === 0) return [...ALL_SOURCES];

    const unknown = names.filter((name) => !isSourceName(name));
    if (unknown.length > 0) {
        throw new ConfigurationError('Unknown source:', unknown.map((name) => `- ${name}`));
    }
    return names.filter(isSourceName);
}

let stopRequested = false;

async function runSource(
    source: SourceName,
    settings: ScraperSettings,
    known: Set<string>,
    collected: JobPosting[],
): Promise<SourceReport> {
    const start = Date.now();
    const report: SourceReport = { postings: 0, batches: 0, durationMs: 0 };

    log.info(`\n${'─'.repeat(60)}`);
    log.info(`  SOURCE: ${source} (${known.size} URLs already known)`);
    log.info(`${'─'.repeat(60)}`);

    for await (const batch of scrape(source, settings, known)) {
        report.batches++;
        report.postings += batch.length;
        for (const posting of batch) {
            collected.push(posting);
            for (const url of posting.sourceUrls) known.add(url);
        }
        if (stopRequested) {
            log.warning(`[Main] Stop requested. Leaving ${source} after ${report.batches} batches.`);
            break;
        }
    }

    report.durationMs = Date.now() - start;
    return report;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<number> {
    const program = new Command()
        .name('au-job-scraper')
        .description('Collect job postings from Australian job boards as normalised records')
        .option('-s, --source <name...>', `sources to run: ${ALL_SOURCES.join(', ')} (default: all)`)
        .option('--initial', 'initial (backfill) run; overrides SCRAPER_INITIAL_RUN')
        .option('-o, --output <file>', 'write postings and a run summary as JSON')
        .option('-v, --verbose', 'debug logging');

    program.parse(argv);
    const options = program.opts<CliOptions>();

    const logFile = initFileLogger();

    let settings: ScraperSettings;
    let sources: SourceName[];
    try {
        const loaded = loadScraperSettings();
        settings = options.initial ? { ...loaded, initialRun: true } : loaded;
        sources = parseSources(options.source);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            log.error(`[Main] ${err.message}`);
            return 1;
        }
        throw err;
    }

    log.setLevel(options.verbose ? LogLevel.DEBUG : LogLevel[settings.logLevel]);
    log.info(`[Main] Logging to ${logFile}`);

    const context = createRunContext(sources, settings.initialRun);
    log.info(
        `[Main] Run ${context.runId}: ${sources.join(', ')} ` +
        `(${context.initialRun ? 'initial' : 'regular'} run)`,
    );

    process.once('SIGINT', () => {
        log.warning('[Main] SIGINT received. Finishing the current batch, then stopping.');
        stopRequested = true;
    });

    const known = new Set<string>();
    const collected: JobPosting[] = [];
    const results: Partial<Record<SourceName, SourceReport>> = {};
    let exitCode = 0;

    for (const source of sources) {
        if (stopRequested) break;
        try {
            results[source] = await runSource(source, settings, known, collected);
        } catch (err) {
            if (err instanceof ConfigurationError) {
                log.error(`[Main] ${err.message}`);
                return 1;
            }
            if (!(err instanceof SessionError)) throw err;
            log.error(`[Main] ${source} aborted: ${err.message}`);
            results[source] = { postings: 0, batches: 0, durationMs: 0, error: err.message };
            exitCode = 1;
        }
    }

    log.info(`\n${'═'.repeat(60)}`);
    log.info('  RUN SUMMARY');
    log.info(`${'═'.repeat(60)}`);
    for (const source of sources) {
        const report = results[source];
        if (!report) continue;
        const status = report.error ? `✗ ${report.error}` : `✓ ${report.postings} postings in ${report.batches} batches`;
        log.info(`  [${source}] ${status} (${(report.durationMs / 1000).toFixed(1)}s)`);
    }
    log.info(`  Total: ${collected.length} postings`);

    if (options.output) {
        const report: RunReport = {
            ...context,
            finishedAt: new Date().toISOString(),
            results,
            postings: collected,
        };
        await fs.writeFile(options.output, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
        log.info(`[Main] Wrote ${collected.length} postings to ${options.output}`);
    }

    return exitCode;
}

main(process.argv)
    .then((code) => {
        closeFileLogger();
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error('[FATAL]', errorMessage(err));
        closeFileLogger();
        process.exitCode = 1;
    });
