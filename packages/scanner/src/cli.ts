#!/usr/bin/env node
// Fund risk scanner — CLI
//
// Usage:
//   fund-scan scan "Tech Growth Fund"                          # full scan of one fund
//   fund-scan batch "Tech Growth Fund" "Value Fund" --export out.csv
//   fund-scan batch --funds "A Fund,B Fund" --concurrency 2    # comma-separated list
//   fund-scan summary "Tech Growth Fund"                       # holdings only
//   fund-scan risk "Tech Growth Fund"                          # risk analysis, no report
//   fund-scan selftest                                         # demo end-to-end check
//   fund-scan --help                                           # usage

import 'dotenv/config';
import { createFmpToolCaller, type FmpBridge } from '../bridge/fmp-bridge.js';
import { loadConfig, type ScannerConfig, type ScannerConfigInput } from '../config/scanner-config.js';
import { BatchRunner } from '../orchestrator/batch-runner.js';
import { createProviderBuckets } from '../orchestrator/rate-limiter.js';
import { ScanOrchestrator } from '../orchestrator/scan-orchestrator.js';
import { createDemoProviders, createFmpProviders, type Providers } from '../providers/index.js';
import type { BatchProgress, ScanResult } from '../types/scan.js';
import { systemClock } from '../utils/clock.js';
import { exportResultsToCsv } from '../utils/csv-export.js';
import { ScannerError, errorMessage } from '../utils/errors.js';
import { getLogger, setLogLevel } from '../utils/logger.js';
import { UsageError, parseArgs, type CliArgs } from './args.js';
import { createPaint, formatActionItems, formatBatch, formatRiskAnalysis, formatScanResult, formatSummary } from './format.js';
import { SELFTEST_FUND, runSelfTest } from './selftest.js';

// Results go to stdout, progress and errors to stderr; each is colored only on a TTY.
const c = createPaint(process.stdout.isTTY ?? false);
const e = createPaint(process.stderr.isTTY ?? false);

class FundScanCli {
  private bridge: FmpBridge | null = null;

  async start(argv: readonly string[] = process.argv.slice(2)): Promise<number | undefined> {
    let args: CliArgs;
    try {
      args = parseArgs(argv);
    } catch (err) {
      if (!(err instanceof UsageError)) throw err;
      console.error(`  ${e('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      return 1;
    }

    if (args.help) {
      this.printHelp();
      return 0;
    }

    const config = this.loadConfig(args);
    setLogLevel(config.logLevel);

    try {
      switch (args.command) {
        case 'help':
          this.printHelp();
          return 0;
        case 'scan':
          return await this.scan(args, config);
        case 'batch':
          return await this.batch(args, config);
        case 'summary':
          return await this.summary(args, config);
        case 'risk':
          return await this.risk(args, config);
        case 'selftest':
          return await this.selftest(config);
      }
    } finally {
      await this.bridge?.disconnect();
      this.bridge = null;
    }
  }

  private loadConfig(args: CliArgs): ScannerConfig {
    const overrides: ScannerConfigInput = {};
    if (args.provider) overrides.provider = args.provider;
    if (args.concurrency !== undefined || args.delayMs !== undefined) {
      overrides.batch = {
        ...(args.concurrency !== undefined ? { concurrency: args.concurrency } : {}),
        ...(args.delayMs !== undefined ? { minDelayMs: args.delayMs } : {}),
      };
    }
    return loadConfig({ file: args.configFile, overrides });
  }

  // ── Wiring ────────────────────────────────────────────────────────

  private async providers(config: ScannerConfig): Promise<Providers> {
    if (config.provider === 'fmp') {
      const apiKey = process.env.FMP_API_KEY;
      if (!apiKey) {
        throw new UsageError('FMP_API_KEY must be set to use --provider fmp');
      }
      const { callFmpTool, bridge } = await createFmpToolCaller({
        serverPath: config.fmp.serverPath,
        command: config.fmp.command,
        env: { FMP_API_KEY: apiKey },
      });
      this.bridge = bridge;
      return createFmpProviders(config, {
        callFmpTool,
        anthropicApiKey: process.env.ANTHROPIC_API_KEY,
      });
    }
    return createDemoProviders();
  }

  private async orchestrator(config: ScannerConfig): Promise<ScanOrchestrator> {
    return new ScanOrchestrator({
      providers: await this.providers(config),
      config,
      rateLimits: createProviderBuckets(config.rateLimits, systemClock),
    });
  }

  // ── Commands ──────────────────────────────────────────────────────

  private async scan(args: CliArgs, config: ScannerConfig): Promise<number> {
    const orchestrator = await this.orchestrator(config);
    const [fund] = args.funds;
    console.error(`\n  ${e('cyan', 'Scanning')} ${fund} ${e('gray', `(${config.provider})`)}\n`);

    const result = await orchestrator.scan(fund);
    console.log(args.json ? JSON.stringify(result, null, 2) : formatScanResult(result, c));
    await this.exportIfRequested(args, [result]);
    return result.status === 'FAILED' ? 1 : 0;
  }

  private async batch(args: CliArgs, config: ScannerConfig): Promise<number> {
    const orchestrator = await this.orchestrator(config);
    const runner = new BatchRunner({ scanner: orchestrator, config });

    const controller = new AbortController();
    const onSigint = () => {
      console.error(`\n  ${e('yellow', 'Cancelling batch...')}`);
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    console.error(
      `\n  ${e('cyan', 'Batch scan')} of ${args.funds.length} fund(s) ` +
        e('gray', `(concurrency ${config.batch.concurrency}, ${config.batch.minDelayMs}ms between starts)`) +
        '\n',
    );

    try {
      const batch = await runner.run(args.funds, {
        signal: controller.signal,
        onProgress: (p) => console.error(this.progressLine(p)),
      });

      console.log(args.json ? JSON.stringify(batch, null, 2) : formatBatch(batch, c));
      if (batch.results.length > 0) {
        await this.exportIfRequested(args, batch.results);
      }

      const anyFailed = batch.results.some((r) => r.status === 'FAILED');
      return anyFailed || batch.cancelled ? 1 : 0;
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }

  private async summary(args: CliArgs, config: ScannerConfig): Promise<number> {
    const orchestrator = await this.orchestrator(config);
    const summary = await orchestrator.summarize(args.funds[0]);
    console.log(args.json ? JSON.stringify(summary, null, 2) : `\n${formatSummary(summary, c)}\n`);
    return 0;
  }

  private async risk(args: CliArgs, config: ScannerConfig): Promise<number> {
    const orchestrator = await this.orchestrator(config);
    const risk = await orchestrator.assessRisk(args.funds[0]);
    if (args.json) {
      console.log(JSON.stringify(risk, null, 2));
    } else {
      console.log(`\n  ${c('bold', args.funds[0])}\n`);
      console.log(formatRiskAnalysis(risk, c));
      console.log(`\n${formatActionItems(risk.actionItems, c)}\n`);
    }
    return 0;
  }

  private async selftest(config: ScannerConfig): Promise<number> {
    const orchestrator = new ScanOrchestrator({
      providers: createDemoProviders(),
      config,
      logger: getLogger('selftest'),
    });

    console.log(`\n  ${c('bold', 'Self-test')} ${c('gray', `(demo provider, ${SELFTEST_FUND})`)}\n`);
    const checks = await runSelfTest(orchestrator);
    for (const check of checks) {
      const mark = check.passed ? c('green', '✓') : c('red', '✗');
      const detail = check.detail ? c('gray', ` (${check.detail})`) : '';
      console.log(`  ${mark} ${check.name}${detail}`);
    }

    const failed = checks.filter((ch) => !ch.passed).length;
    console.log(
      failed === 0
        ? `\n  ${c('green', `All ${checks.length} checks passed`)}\n`
        : `\n  ${c('red', `${failed} of ${checks.length} checks failed`)}\n`,
    );
    return failed === 0 ? 0 : 1;
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private async exportIfRequested(args: CliArgs, results: readonly ScanResult[]): Promise<void> {
    if (!args.exportPath) return;
    const path = await exportResultsToCsv(results, args.exportPath);
    console.error(`  ${e('green', 'Exported')} ${results.length} result(s) to ${path}`);
  }

  private progressLine(p: BatchProgress): string {
    const counter = e('gray', `[${p.completed}/${p.total}]`);
    switch (p.status) {
      case 'running':
        return `  ${counter} ${e('cyan', '→')} ${p.current}`;
      case 'completed':
        return `  ${counter} ${e('green', '✓')} ${p.current}`;
      case 'failed':
        return `  ${counter} ${e('red', '✗')} ${p.current}${p.error ? e('gray', ` (${p.error})`) : ''}`;
    }
  }

  private printHelp(): void {
    console.log(`
${c('bold', 'fund-scan')} — fund risk scanner

${c('bold', 'Usage:')}
  fund-scan scan <fund>              Full scan: holdings, news, risk and report
  fund-scan batch <fund> [fund...]   Scan several funds and compare them
  fund-scan summary <fund>           Holdings and sector allocation only
  fund-scan risk <fund>              Risk analysis without a narrative report
  fund-scan selftest                 Run the demo fund end to end
  fund-scan --help                   Show this help

${c('bold', 'Options:')}
  --provider <demo|fmp>     Data provider (default: demo, or SCANNER_PROVIDER)
  --funds <a,b,...>         Comma-separated fund names (batch)
  --concurrency <n>         Concurrent scans in a batch (default: 1)
  --delay <ms>              Minimum spacing between scan starts (default: 1000)
  --export <file.csv>       Write results as CSV, one row per action item
  --config <file.json>      Configuration file (or SCANNER_CONFIG_FILE)
  --json                    Print results as JSON

${c('bold', 'Environment:')}
  FMP_API_KEY               Required for --provider fmp
  ANTHROPIC_API_KEY         Narrative reports with --provider fmp
  LOG_LEVEL                 fatal|error|warn|info|debug|trace|silent (logs go to stderr)

${c('bold', 'Examples:')}
  ${c('gray', '$')} fund-scan scan "Tech Growth Fund"
  ${c('gray', '$')} fund-scan batch "Tech Growth Fund" "Defunct Fund" --export scan.csv
`);
  }
}

const cli = new FundScanCli();
cli
  .start()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const label = err instanceof ScannerError || err instanceof UsageError ? 'Error:' : 'Fatal:';
    console.error(`${e('red', label)} ${errorMessage(err)}`);
    process.exit(1);
  });
