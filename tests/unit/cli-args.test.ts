/**
 * CLI Argument Tests
 */
import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../src/cli/args.js';
import { mapEnvToConfig, mergeConfigInput, parseConfig } from '../../src/config/index.js';
import { ConfigError } from '../../src/errors.js';

function configFrom(argv: string[], env: NodeJS.ProcessEnv = { API_ID: 'env-api', AFFILIATE_ID: 'env-aff-990' }) {
    return parseConfig(mergeConfigInput(mapEnvToConfig(env), parseCliArgs(argv).input));
}

describe('CLI arguments', () => {
    it('should fall back to the environment when flags are absent', () => {
        const config = configFrom([]);

        expect(config.catalog.apiId).toBe('env-api');
        expect(config.images.networkCheck).toBe(true);
        expect(config.content.enabled).toBe(true);
        expect(config.cms.enabled).toBe(false);
    });

    it('should let flags override the environment', () => {
        const config = configFrom(['--api-id', 'cli-api', '--floor', 'videoc', '--hits', '20', '--max', '60', '--sort', 'rank']);

        expect(config.catalog).toMatchObject({ apiId: 'cli-api', floor: 'videoc', hits: 20, max: 60, sort: 'rank' });
    });

    it('should convert seconds to milliseconds', () => {
        const config = configFrom(['--sleep', '1.5', '--head-timeout', '2']);

        expect(config.catalog.requestIntervalMs).toBe(1500);
        expect(config.images.headTimeoutMs).toBe(2000);
    });

    it('should collect repeated filter flags', () => {
        const config = configFrom([
            '--include-genre', 'drama',
            '--include-genre', 'comedy',
            '--exclude-cid-prefix', 'abc',
            '--min-samples', '3',
            '--release-after', '2024-06-01',
        ]);

        expect(config.filters.includeGenre).toEqual(['drama', 'comedy']);
        expect(config.filters.excludeProductCode).toEqual(['abc']);
        expect(config.filters.minSamples).toBe(3);
        expect(config.filters.releaseCutoff).toBe('2024-06-01');
    });

    it('should map negative switches', () => {
        const config = configFrom(['--no-head-check', '--head-insecure', '--no-content', '--verify-images', '--skip-placeholder']);

        expect(config.images).toMatchObject({ networkCheck: false, verifyTls: false, verifyImages: true, skipPlaceholder: true });
        expect(config.content.enabled).toBe(false);
    });

    it('should map WordPress flags', () => {
        const config = configFrom([
            '--wp-post',
            '--wp-url', 'https://blog.example.test',
            '--wp-user', 'editor',
            '--wp-app-pass', 'test-secret',
            '--wp-categories', 'News,Reviews',
            '--publish',
            '--future-datetime', '2030-01-01T09:00:00',
            '--no-update-existing',
        ]);

        expect(config.cms).toMatchObject({
            enabled: true,
            baseUrl: 'https://blog.example.test',
            username: 'editor',
            appPassword: 'test-secret',
            categories: ['News', 'Reviews'],
            publishNow: true,
            futureAt: '2030-01-01T09:00:00',
            skipExisting: true,
        });
    });

    it('should turn --debug into the debug log level', () => {
        expect(configFrom(['--debug']).logLevel).toBe('debug');
    });

    it('should report the help flag', () => {
        expect(parseCliArgs(['-h']).help).toBe(true);
        expect(parseCliArgs([]).help).toBe(false);
    });

    it('should reject unknown flags as a configuration error', () => {
        expect(() => parseCliArgs(['--frobnicate'])).toThrow(ConfigError);
    });
});
