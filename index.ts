/**
 * Command-line entry point for yield curve ingestion
 *
 * Usage:
 *   yield-curve [--start YYYY-MM-DD] [--out path] [--anchor KEY]
 *
 * Exit status:
 *   0 curve written
 *   1 configuration or I/O error
 *   2 anchor series unavailable, or no series acquired at all
 */

import { CurveIngestionService } from './service';
import { readEnvConfig, validateConfig } from './src/config';
import { ResponseFetcher } from './src/clients/http-retrier';
import { EmptyResultSetError, NoAnchorDataError } from './src/errors';
import { CurveConfig } from './src/types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_DATA = 2;

const USAGE = 'Usage: yield-curve [--start YYYY-MM-DD] [--out path] [--anchor KEY]';

interface CliOptions {
    start?: string;
    out?: string;
    anchor?: string;
}

/**
 * Parse command line arguments
 * @throws Error on unknown flags or a flag without a value
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = {};

    for (let i = 0; i < argv.length; i++) {
        const flag = argv[i];
        const value = argv[i + 1];

        if (flag !== '--start' && flag !== '--out' && flag !== '--anchor') {
            throw new Error(`Unknown argument: ${flag}`);
        }
        if (value === undefined || value.startsWith('--')) {
            throw new Error(`Missing value for ${flag}`);
        }

        options[flag === '--start' ? 'start' : flag === '--out' ? 'out' : 'anchor'] = value;
        i++;
    }

    return options;
}

function applyOptions(config: CurveConfig, options: CliOptions): CurveConfig {
    return validateConfig({
        ...config,
        startDate: options.start ?? config.startDate,
        outputPath: options.out ?? config.outputPath,
        anchorKey: options.anchor ?? config.anchorKey
    });
}

/**
 * Run one ingestion and map the outcome to an exit status
 * @param argv Arguments after the script name
 * @param env Environment to read configuration from
 * @param fetcher Optional response source (tests inject fixtures here)
 */
export async function main(
    argv: readonly string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
    fetcher?: ResponseFetcher
): Promise<number> {
    let config: CurveConfig;
    try {
        // Flags take precedence over the environment; validation runs once on the merged result
        config = applyOptions(readEnvConfig(env), parseArgs(argv));
    } catch (error) {
        console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
        console.error(USAGE);
        return EXIT_FAILURE;
    }

    console.log(`Starting yield curve ingestion from ${config.startDate}`);
    console.log(`Anchor: ${config.anchorKey} | Series: ${config.series.map(s => s.key).join(', ')}`);

    try {
        const service = new CurveIngestionService(config, fetcher);
        await service.run();
        return EXIT_OK;
    } catch (error) {
        if (error instanceof NoAnchorDataError || error instanceof EmptyResultSetError) {
            console.error(`ERROR: ${error.message}`);
            return EXIT_NO_DATA;
        }

        console.error('Ingestion failed:', error);
        return EXIT_FAILURE;
    }
}
