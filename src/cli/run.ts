/**
 * CLI run: config layering, pipeline, artifacts, exit code
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parseCliArgs, USAGE } from './args.js';
import {
    getRedactedConfig,
    mapEnvToConfig,
    mergeConfigInput,
    parseConfig,
    type PipelineConfig,
} from '../config/index.js';
import { ConfigError } from '../errors.js';
import { writeCsv } from '../export/csv.js';
import { closeProbeAgents } from '../images/probe.js';
import { logger, setLogLevel } from '../observability/logger.js';
import { getMetrics } from '../observability/metrics.js';
import { runPipeline, type PipelineDeps } from '../pipeline/index.js';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_HALTED = 2;

export interface CliIo {
    stdout(text: string): void;
    stderr(text: string): void;
}

const processIo: CliIo = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
};

export async function runCli(
    argv: string[],
    env: NodeJS.ProcessEnv,
    io: CliIo = processIo,
    deps: PipelineDeps = {}
): Promise<number> {
    let config: PipelineConfig;
    try {
        const args = parseCliArgs(argv);
        if (args.help) {
            io.stdout(USAGE);
            return EXIT_OK;
        }
        config = parseConfig(mergeConfigInput(mapEnvToConfig(env), args.input));
    } catch (error) {
        if (error instanceof ConfigError) {
            io.stderr(`${error.message}\n\n${USAGE}`);
            return EXIT_CONFIG_ERROR;
        }
        throw error;
    }

    setLogLevel(config.logLevel);
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        const report = await runPipeline(config, deps);

        if (config.output.csvPath) {
            await writeCsv(config.output.csvPath, report.rows, { includeContent: config.content.enabled });
            logger.info('CSV written', { path: config.output.csvPath, rows: report.rows.length });
        }

        if (config.output.metricsPath) {
            await mkdir(dirname(config.output.metricsPath), { recursive: true });
            await writeFile(config.output.metricsPath, await getMetrics(), 'utf8');
        }

        logger.info('Run summary', {
            runId: report.runId,
            ...report.counters,
            rejections: report.rejections,
            failures: report.failures.length,
            haltedBy: report.haltedBy,
        });

        return report.haltedBy ? EXIT_HALTED : EXIT_OK;
    } finally {
        await closeProbeAgents();
    }
}
