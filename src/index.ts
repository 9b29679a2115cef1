import { loadReturnsCsv, loadUniverseCsv } from './data/csv-loader.js';
import { loadBatchManifest } from './data/manifest.js';
import { positiveIntArg, probabilityArg } from './data/schemas.js';
import { config } from './config.js';
import { closeDb, getDb } from './db/database.js';
import {
  formatBatchSummary,
  formatBootstrap,
  formatThreshold,
  formatValidation,
  formatVerdictLine,
  formatWalkForward,
} from './report/formatter.js';
import { ValidationReport } from './report/validation-report.js';
import { BaselineCache, MemoryBaselineCache, SqliteBaselineCache } from './validation/baseline-cache.js';
import { BootstrapValidator } from './validation/bootstrap.js';
import { MultipleComparisonCorrector } from './validation/multiple-comparison.js';
import { ValidationOrchestrator, type OrchestratorOptions } from './validation/orchestrator.js';
import { toVerdictRecords } from './validation/verdict.js';
import { WalkForwardAnalyzer } from './validation/walk-forward.js';
import type { UniverseSnapshot } from './types/index.js';

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts validate <returns.csv> [options]
  tsx src/index.ts batch <manifest.json> [options]
  tsx src/index.ts walkforward <returns.csv> [options]
  tsx src/index.ts bootstrap <returns.csv> [options]
  tsx src/index.ts threshold --strategies <N> --periods <T> [--bootstrap]

Commands:
  validate      Run the full validation pipeline on one strategy
  batch         Validate every candidate in a manifest (Bonferroni N = candidates)
  walkforward   Walk-forward analysis only
  bootstrap     Block bootstrap confidence interval only
  threshold     Bonferroni Sharpe threshold for N strategies over T periods

Options:
  --equity                  Input CSV holds timestamp,equity instead of timestamp,return
  --universe <csv>          Wide close-price CSV (timestamp,SYM1,SYM2,...) for baselines
  --caps <csv>              Wide market-cap CSV matching --universe
  --benchmark <symbol>      Benchmark column for buy-and-hold (default: ${config.baseline.benchmark})
  --strict                  Error on reports that cannot be filtered by date
  --json                    Print verdict records as JSON
  --id <name>               Strategy id for validate (default: file path)
  --out <path>              Save the JSON report
  --train-bars <number>     Walk-forward train bars (default: ${config.walkForward.trainBars})
  --test-bars <number>      Walk-forward test bars (default: ${config.walkForward.testBars})
  --min-windows <number>    Minimum walk-forward windows (default: ${config.walkForward.minWindows})
  --iterations <number>     Bootstrap iterations (default: ${config.bootstrap.iterations})
  --block-size <number>     Bootstrap block size (default: ${config.calibration.blockSize})
  --confidence <number>     Bootstrap confidence level (default: ${config.bootstrap.confidence})
`);
}

function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    } else if (!map.has('_file')) {
      map.set('_file', arg);
    }
  }
  return map;
}

function getInt(args: Map<string, string>, key: string, def: number): number {
  const v = args.get(key);
  return v ? positiveIntArg.parse(v) : def;
}

function createCache(): BaselineCache {
  const store = config.baseline.cachePath
    ? new SqliteBaselineCache(getDb())
    : new MemoryBaselineCache();
  return new BaselineCache(store);
}

function loadUniverse(args: Map<string, string>): UniverseSnapshot | undefined {
  const closes = args.get('--universe');
  if (!closes) return undefined;
  const caps = args.get('--caps');
  return loadUniverseCsv(closes, {
    benchmark: args.get('--benchmark') ?? config.baseline.benchmark,
    ...(caps ? { marketCapsPath: caps } : {}),
  });
}

function orchestratorOptions(
  args: Map<string, string>,
  universe: UniverseSnapshot | undefined,
  strict: boolean,
): OrchestratorOptions {
  return {
    dataSplit: { strict },
    baseline: { strict },
    walkForward: {
      trainBars: getInt(args, '--train-bars', config.walkForward.trainBars),
      testBars: getInt(args, '--test-bars', config.walkForward.testBars),
      minWindows: getInt(args, '--min-windows', config.walkForward.minWindows),
    },
    bootstrap: {
      iterations: getInt(args, '--iterations', config.bootstrap.iterations),
      blockSize: getInt(args, '--block-size', config.calibration.blockSize),
    },
    ...(universe ? { universe, baselineCache: createCache() } : {}),
  };
}

function emit(report: ValidationReport, args: Map<string, string>): void {
  const out = args.get('--out');
  if (out) {
    report.saveJson(out);
    console.log(`Report saved to ${out}`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');
  const file = args.get('_file');
  const strict = args.has('--strict') || config.strictFiltering;

  if (!command || (!file && command !== 'threshold')) {
    printUsage();
    process.exit(1);
  }

  try {
    run(command, file, args, strict);
  } finally {
    closeDb();
  }
}

function run(command: string, file: string | undefined, args: Map<string, string>, strict: boolean): void {
  switch (command) {
    case 'validate': {
      const series = loadReturnsCsv(file ?? '', { kind: args.has('--equity') ? 'equity' : 'returns' });
      console.log(`Loaded ${series.length} periods from ${file}`);

      const orchestrator = new ValidationOrchestrator(orchestratorOptions(args, loadUniverse(args), strict));
      const result = orchestrator.validateStrategy({ strategyId: args.get('--id') ?? file ?? 'strategy', report: series });

      if (args.has('--json')) {
        console.log(JSON.stringify(toVerdictRecords(result), null, 2));
      } else {
        console.log(formatValidation(result));
      }

      const report = new ValidationReport();
      report.add(result);
      emit(report, args);
      process.exitCode = result.overallPassed ? 0 : 2;
      break;
    }

    case 'batch': {
      const batch = loadBatchManifest(file ?? '');
      const universe = batch.universe ?? loadUniverse(args);
      const orchestrator = new ValidationOrchestrator(
        orchestratorOptions(args, universe, batch.strict ?? strict),
      );
      const results = orchestrator.validateBatch(batch.candidates, batch.familySize);

      const report = new ValidationReport();
      report.addAll(results);

      if (args.has('--json')) {
        console.log(JSON.stringify(report.toJSON(), null, 2));
      } else {
        for (const r of results) {
          console.log(`${r.overallPassed ? 'PASS' : 'FAIL'} ${r.strategyId}`);
          for (const v of r.verdicts) console.log(`  ${formatVerdictLine(v)}`);
        }
        console.log(formatBatchSummary(report.summary()));
      }
      emit(report, args);
      break;
    }

    case 'walkforward': {
      const series = loadReturnsCsv(file ?? '', { kind: args.has('--equity') ? 'equity' : 'returns' });
      const analyzer = new WalkForwardAnalyzer({
        trainBars: getInt(args, '--train-bars', config.walkForward.trainBars),
        testBars: getInt(args, '--test-bars', config.walkForward.testBars),
        minWindows: getInt(args, '--min-windows', config.walkForward.minWindows),
      });
      console.log(formatWalkForward(analyzer.analyze(series)));
      break;
    }

    case 'bootstrap': {
      const series = loadReturnsCsv(file ?? '', { kind: args.has('--equity') ? 'equity' : 'returns' });
      const confidence = args.get('--confidence');
      const validator = new BootstrapValidator({
        iterations: getInt(args, '--iterations', config.bootstrap.iterations),
        blockSize: getInt(args, '--block-size', config.calibration.blockSize),
        confidence: confidence ? probabilityArg.parse(confidence) : config.bootstrap.confidence,
      });
      console.log(formatBootstrap(validator.run(series)));
      break;
    }

    case 'threshold': {
      const corrector = new MultipleComparisonCorrector(getInt(args, '--strategies', 1), {
        bootstrapAudit: args.has('--bootstrap') || config.multipleComparison.bootstrapAudit,
      });
      console.log(formatThreshold(corrector.threshold(getInt(args, '--periods', config.calibration.annualizationFactor))));
      console.log(`  FWER: ${corrector.familyWiseErrorRate().toFixed(4)} (≤ ${config.multipleComparison.alpha})`);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
