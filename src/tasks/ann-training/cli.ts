#!/usr/bin/env npx tsx
/**
 * @module tasks/ann-training/cli
 * @description Train a regression network on a CSV file with PSO and memetic PSO
 *
 * Usage:
 *   npx tsx src/tasks/ann-training/cli.ts data.csv
 *   npx tsx src/tasks/ann-training/cli.ts data.csv --mode hybrid --iterations 500
 *   npm run train -- data.csv
 */

import { ConsoleLogger, MultiLogger, type Logger } from '../../core/logging';
import { createFileLogger } from '../../core/logging-node';
import { loadDataset } from '../../models/data/dataset-node';
import { DEFAULT_TRAINING_CONFIG, type TrainingConfig } from './config';
import { trainWithHybrid, trainWithPso, type TrainingResult } from './trainer';

// ==================== Argument Parsing ====================

type TrainingMode = 'pso' | 'hybrid' | 'both';

interface CliArgs {
    file?: string;
    mode: TrainingMode;
    hidden: number;
    particles: number;
    iterations: number;
    seed: number;
    logEvery: number;
    csvDir?: string;
    help: boolean;
}

function parseIntArg(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function parseMode(value: string | undefined): TrainingMode {
    return value === 'pso' || value === 'hybrid' ? value : 'both';
}

function parseArgs(): CliArgs {
    const args: CliArgs = {
        mode: 'both',
        hidden: DEFAULT_TRAINING_CONFIG.hiddenNeurons,
        particles: DEFAULT_TRAINING_CONFIG.particleCount,
        iterations: DEFAULT_TRAINING_CONFIG.iterations,
        seed: DEFAULT_TRAINING_CONFIG.seed,
        logEvery: DEFAULT_TRAINING_CONFIG.logEvery,
        help: false,
    };

    const argv = process.argv.slice(2);

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--mode' || arg === '-m') {
            args.mode = parseMode(argv[++i]);
        } else if (arg === '--hidden') {
            args.hidden = parseIntArg(argv[++i], args.hidden);
        } else if (arg === '--particles' || arg === '-p') {
            args.particles = parseIntArg(argv[++i], args.particles);
        } else if (arg === '--iterations' || arg === '-n') {
            args.iterations = parseIntArg(argv[++i], args.iterations);
        } else if (arg === '--seed' || arg === '-s') {
            args.seed = parseIntArg(argv[++i], args.seed);
        } else if (arg === '--log-every') {
            args.logEvery = parseIntArg(argv[++i], args.logEvery);
        } else if (arg === '--csv') {
            args.csvDir = argv[++i];
        } else if (!arg.startsWith('-') && args.file === undefined) {
            args.file = arg;
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
Network training with PSO and memetic PSO

Usage:
  npx tsx src/tasks/ann-training/cli.ts <file.csv> [options]

The last column of each row is the target; earlier columns are features.

Options:
  -h, --help            Show this help message
  -m, --mode MODE       pso | hybrid | both (default: both)
      --hidden N        Hidden neurons (default: ${DEFAULT_TRAINING_CONFIG.hiddenNeurons})
  -p, --particles N     Swarm size (default: ${DEFAULT_TRAINING_CONFIG.particleCount})
  -n, --iterations N    Iterations (default: ${DEFAULT_TRAINING_CONFIG.iterations})
  -s, --seed N          Random seed (default: ${DEFAULT_TRAINING_CONFIG.seed})
      --log-every N     Progress interval (default: ${DEFAULT_TRAINING_CONFIG.logEvery})
      --csv DIR         Write iter,best_f,elapsed_ms CSV logs into DIR
`);
}

// ==================== Main ====================

function createRunLogger(run: string, args: CliArgs): Logger {
    const config = { run, seed: args.seed, outputDir: args.csvDir };
    const consoleLogger = new ConsoleLogger({ ...config, level: 'warn' });
    return args.csvDir !== undefined
        ? new MultiLogger([consoleLogger, createFileLogger('csv', config)])
        : consoleLogger;
}

function printResult(label: string, result: TrainingResult): void {
    console.log(`${label} Train MSE: ${result.trainMse.toFixed(6)}`);
    console.log(`${label} Val   MSE: ${result.validationMse.toFixed(6)}`);
}

function main(): void {
    const args = parseArgs();
    const file = args.file;

    if (args.help || file === undefined) {
        printHelp();
        process.exit(args.help ? 0 : 1);
    }

    console.log('');
    console.log('============================================================');
    console.log('     MEMETIC-PSO - Network Training (CLI)                   ');
    console.log('============================================================');
    console.log('');

    const overrides: Partial<TrainingConfig> = {
        hiddenNeurons: args.hidden,
        particleCount: args.particles,
        iterations: args.iterations,
        seed: args.seed,
        logEvery: args.logEvery,
    };
    const onIteration = (iteration: number, best: number): void => {
        console.log(`  iter ${iteration}: best ${best.toFixed(6)}`);
    };

    try {
        const samples = loadDataset(file);
        console.log(`Loaded ${samples.length} rows from ${file}`);

        if (args.mode !== 'hybrid') {
            const logger = createRunLogger('train/pso', args);
            try {
                printResult('PSO-only  ', trainWithPso(samples, overrides, { logger, onIteration }));
            } finally {
                logger.close();
            }
        }
        if (args.mode !== 'pso') {
            const logger = createRunLogger('train/hybrid', args);
            try {
                printResult('Hybrid    ', trainWithHybrid(samples, overrides, { logger, onIteration }));
            } finally {
                logger.close();
            }
        }

        console.log('');
        console.log('[OK] Training completed successfully');
        console.log('');
    } catch (error) {
        console.error('');
        console.error('[FAILED] Training failed:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        console.error('');
        process.exit(1);
    }
}

// Run if executed directly
main();
