#!/usr/bin/env npx tsx
/**
 * @module tasks/benchmark/cli
 * @description Command-line comparison of PSO and memetic PSO
 *
 * Usage:
 *   npx tsx src/tasks/benchmark/cli.ts
 *   npx tsx src/tasks/benchmark/cli.ts --function rastrigin --dims 20 --iterations 2000
 *   npm run bench
 */

import { createFileLogger } from '../../core/logging-node';
import { listBenchmarkFunctions } from '../../models/numeric/optimization/benchmark-functions';
import { DEFAULT_COMPARISON_CONFIG, type ComparisonOverrides, type GradientSource } from './config';
import { compareOptimizers, formatComparisonTable } from './compare';

// ==================== Argument Parsing ====================

interface CliArgs {
    functions: string[];
    dimensions: number;
    iterations: number;
    particles: number;
    seed: number;
    gradient: GradientSource;
    csvDir?: string;
    help: boolean;
}

function parseIntArg(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function parseArgs(): CliArgs {
    const args: CliArgs = {
        functions: [],
        dimensions: DEFAULT_COMPARISON_CONFIG.dimensions,
        iterations: DEFAULT_COMPARISON_CONFIG.run.iterations,
        particles: DEFAULT_COMPARISON_CONFIG.run.particleCount,
        seed: DEFAULT_COMPARISON_CONFIG.run.seed,
        gradient: DEFAULT_COMPARISON_CONFIG.gradient,
        help: false,
    };

    const argv = process.argv.slice(2);

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--function' || arg === '-f') {
            args.functions.push(argv[++i] ?? '');
        } else if (arg === '--dims' || arg === '-d') {
            args.dimensions = parseIntArg(argv[++i], args.dimensions);
        } else if (arg === '--iterations' || arg === '-n') {
            args.iterations = parseIntArg(argv[++i], args.iterations);
        } else if (arg === '--particles' || arg === '-p') {
            args.particles = parseIntArg(argv[++i], args.particles);
        } else if (arg === '--seed' || arg === '-s') {
            args.seed = parseIntArg(argv[++i], args.seed);
        } else if (arg === '--analytic') {
            args.gradient = 'analytic';
        } else if (arg === '--csv') {
            args.csvDir = argv[++i];
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
PSO vs memetic PSO benchmark

Usage:
  npx tsx src/tasks/benchmark/cli.ts [options]

Options:
  -h, --help            Show this help message
  -f, --function NAME   Benchmark function, repeatable (default: all of ${listBenchmarkFunctions().join(', ')})
  -d, --dims N          Dimensionality (default: ${DEFAULT_COMPARISON_CONFIG.dimensions}; schafferF6 is always 2)
  -n, --iterations N    Iterations per run (default: ${DEFAULT_COMPARISON_CONFIG.run.iterations})
  -p, --particles N     Swarm size (default: ${DEFAULT_COMPARISON_CONFIG.run.particleCount})
  -s, --seed N          Random seed (default: ${DEFAULT_COMPARISON_CONFIG.run.seed})
      --analytic        Refine with analytical gradients instead of finite differences
      --csv DIR         Write iter,best_f,elapsed_ms CSV logs per run into DIR

Examples:
  npx tsx src/tasks/benchmark/cli.ts
  npx tsx src/tasks/benchmark/cli.ts -f rosenbrock -d 5 --csv ./logs
`);
}

// ==================== Main ====================

function main(): void {
    const args = parseArgs();

    if (args.help) {
        printHelp();
        process.exit(0);
    }

    console.log('');
    console.log('============================================================');
    console.log('     MEMETIC-PSO - Benchmark Comparison (CLI)               ');
    console.log('============================================================');
    console.log('');

    const overrides: ComparisonOverrides = {
        functions: args.functions,
        dimensions: args.dimensions,
        gradient: args.gradient,
        run: {
            iterations: args.iterations,
            particleCount: args.particles,
            seed: args.seed,
        },
    };
    const csvDir = args.csvDir;

    try {
        const rows = compareOptimizers(
            overrides,
            csvDir !== undefined
                ? (run) => createFileLogger('csv', { run, seed: args.seed, outputDir: csvDir })
                : undefined
        );

        console.log(formatComparisonTable(rows));
        console.log('');
        console.log('[OK] Benchmark completed successfully');
        console.log('');
    } catch (error) {
        console.error('');
        console.error('[FAILED] Benchmark failed:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        console.error('');
        process.exit(1);
    }
}

// Run if executed directly
main();
