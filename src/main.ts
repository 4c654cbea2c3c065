/**
 * src/main.ts
 *
 * ENTRY POINT
 *
 *   npm start                 one ingestion run with the settings from .env
 *   npm start -- --verbose    same, with debug logging
 *
 * Ctrl+C (or SIGTERM) cancels the run: pages already fetched are still
 * extracted, normalized and deduplicated before the summary is printed.
 * A second signal exits immediately.
 */

import 'dotenv/config';
import { log } from 'crawlee';
import { env } from './config/env.js';
import { buildPipelineConfig } from './config/pipelineConfig.js';
import type { CanonicalJobPosting } from './models/jobPosting.js';
import { runPipeline } from './orchestrator.js';
import type { PipelineRunResult } from './orchestrator.js';
import { summarizeViolations } from './utils/backoff.js';
import { PreconditionError, errorMessage } from './utils/errors.js';

// ─── Logging ──────────────────────────────────────────────────────────────────

type LogLevel = ReturnType<typeof log.getLevel>;

const LOG_LEVELS: Record<string, LogLevel> = {
    OFF: log.LEVELS.OFF,
    ERROR: log.LEVELS.ERROR,
    WARNING: log.LEVELS.WARNING,
    INFO: log.LEVELS.INFO,
    DEBUG: log.LEVELS.DEBUG,
};

const isVerbose = env.VERBOSE || process.argv.includes('--verbose') || process.argv.includes('-v');
log.setLevel(isVerbose ? log.LEVELS.DEBUG : LOG_LEVELS[env.CRAWLEE_LOG_LEVEL.toUpperCase()] ?? log.LEVELS.INFO);

// ─── Summary ──────────────────────────────────────────────────────────────────

function countBy(jobs: readonly CanonicalJobPosting[], key: 'region' | 'category' | 'workType'): string {
    const counts = new Map<string, number>();
    for (const job of jobs) {
        counts.set(job[key], (counts.get(job[key]) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .map(([name, n]) => `${name}: ${n}`)
        .join(', ') || 'none';
}

function logSummary(result: PipelineRunResult): void {
    log.info('═'.repeat(60));
    log.info(`  RUN SUMMARY (${result.source}${result.cancelled ? ', cancelled' : ''})`);
    log.info('═'.repeat(60));
    log.info(`  Pages fetched     : ${result.sourcePages} (${result.totalFailedPages} failed)`);
    log.info(`  Postings extracted: ${result.totalExtracted}`);
    log.info(`  Unique postings   : ${result.totalParsed} (${result.duplicateCount} duplicates dropped)`);
    log.info(`  By region         : ${countBy(result.jobs, 'region')}`);
    log.info(`  By category       : ${countBy(result.jobs, 'category')}`);
    log.info(`  By work type      : ${countBy(result.jobs, 'workType')}`);
    log.info(`  AI mentions       : ${result.jobs.filter((j) => j.hasAiMention).length}`);
    log.info(`  Duration          : ${(result.durationMs / 1000).toFixed(1)}s`);

    if (result.captchaEncountered) {
        log.warning('  CAPTCHA encountered during this run');
    }
    if (result.failedQueries.length > 0) {
        log.warning(`  Failed queries (${result.failedQueries.length}): ${result.failedQueries.join(', ')}`);
    }

    const violations = summarizeViolations();
    const totalViolations = violations.captcha + violations.rate_limited + violations.soft_failure;
    if (totalViolations > 0) {
        log.info(
            `  Throttling events : ${totalViolations} ` +
            `[captcha:${violations.captcha} rate_limited:${violations.rate_limited} ` +
            `soft_failure:${violations.soft_failure}]`,
        );
    }
}

// ─── Run ──────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const config = buildPipelineConfig(env);
    const controller = new AbortController();

    const shutdown = (signal: string): void => {
        if (controller.signal.aborted) {
            log.warning(`[Main] ${signal} received again, exiting now.`);
            process.exit(130);
        }
        log.warning(`[Main] ${signal} received, finishing with the pages fetched so far…`);
        controller.abort();
    };
    process.on('SIGINT', () => shutdown('SIGINT (Ctrl+C)'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    log.info(`[Main] Mode: ${config.mode} | Roles: ${config.roles.length} | Locations: ${config.locations.length}`);

    const result = await runPipeline(config, { signal: controller.signal });
    logSummary(result);
}

main().catch((err: unknown) => {
    if (err instanceof PreconditionError) {
        log.error(`[Main] ${err.message}`);
    } else {
        console.error('[FATAL]', err);
        log.error(`[Main] ${errorMessage(err)}`);
    }
    process.exitCode = 1;
});
