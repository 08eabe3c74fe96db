#!/usr/bin/env node
/**
 * Catalog Publisher - CLI entry point
 *
 * Pulls products from the catalog API, filters and renders them, and
 * optionally upserts WordPress posts. Environment comes from `.env`; flags
 * override it.
 */
import 'dotenv/config';
import { runCli } from './cli/run.js';
import { logger } from './observability/logger.js';

runCli(process.argv.slice(2), process.env)
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.error('Run failed', error);
        process.exitCode = 1;
    });
