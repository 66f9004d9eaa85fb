/**
 * Main application orchestrator
 */
import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import { validateScanConfig } from './config.js';
import { InventoryError, TransportError, errorMessage } from './errors.js';
import { describeOutcome, isObserved } from './outcome.js';
import { TlsProber } from './probe.js';
import { Reconciler } from './reconciler.js';
import { ReportBuilder, summarize } from './report.js';
import { ScanScheduler } from './scheduler.js';
import { planTargets } from './target.js';
import { renderReport, describeDays, type RenderOptions } from '../notify/render.js';
import { logger } from '../utils/logger.js';
import type { InventorySource } from '../inventory/sources.js';
import type {
  CertificateVerdict,
  Inventory,
  NotificationTransport,
  OutputOptions,
  Prober,
  ScanConfig,
  ScanMetadata,
  ScanReport,
  VerdictSummary,
} from './types.js';

/**
 * Collaborators of a scan run. Only the inventory is required.
 */
export interface ScanDependencies {
  inventory: InventorySource;
  transport?: NotificationTransport;
  prober?: Prober;
  now?: () => Date;
  render?: RenderOptions;
}

/**
 * Everything a run produced, whether or not there is anything to report
 */
export interface ScanRun {
  report: ScanReport | null;
  verdicts: CertificateVerdict[];
  summary: VerdictSummary;
  metadata: ScanMetadata;
}

const QUIET_OUTPUT: OutputOptions = { format: 'text', quiet: true };

/**
 * Main application class that orchestrates the scan
 */
export class App {
  private config: ScanConfig;
  private output: OutputOptions;
  private deps: ScanDependencies;
  private now: () => Date;
  private scheduler: ScanScheduler;
  private reconciler: Reconciler;
  private reportBuilder: ReportBuilder;

  /**
   * Throws ConfigError before anything else happens
   */
  constructor(
    config: Partial<ScanConfig>,
    deps: ScanDependencies,
    output: OutputOptions = QUIET_OUTPUT
  ) {
    this.config = validateScanConfig(config);
    this.output = output;
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.scheduler = new ScanScheduler(deps.prober ?? new TlsProber(), {
      concurrency: this.config.concurrency,
      probeTimeoutMs: this.config.probeTimeoutMs,
      deadlineMs: this.config.deadlineMs,
      retries: this.config.retries,
      retryDelayMs: this.config.retryDelayMs,
      now: this.now,
    });
    this.reconciler = new Reconciler();
    this.reportBuilder = new ReportBuilder();
  }

  getConfig(): Readonly<ScanConfig> {
    return this.config;
  }

  /**
   * Run the complete scan workflow. Returns the report, or null when nothing
   * needs attention (the transport is not called in that case).
   */
  async run(): Promise<ScanReport | null> {
    const scan = await this.scan();
    await this.outputResults(scan);

    if (scan.report && this.deps.transport) {
      await this.notify(scan.report, this.deps.transport);
    }

    return scan.report;
  }

  /**
   * Probe, reconcile and build the report without output or notification
   */
  async scan(): Promise<ScanRun> {
    const startedAt = this.now();

    logger.info(chalk.cyan.bold('Step 1/3') + chalk.cyan('  Loading inventory...'));
    const inventory = await this.loadInventory();

    logger.info(chalk.cyan.bold('Step 2/3') + chalk.cyan('  Probing domains...'));
    const plan = planTargets(inventory, this.config.defaultPort, startedAt);
    if (plan.rejected.length > 0) {
      logger.warn(`Skipping ${plan.rejected.length} malformed domain names`, {
        domains: plan.rejected.map((r) => r.domain).join(','),
      });
    }
    const { results, deadlineReached } = await this.scheduler.scan(plan.targets);
    const allResults = [...results, ...plan.rejected];

    logger.info(chalk.cyan.bold('Step 3/3') + chalk.cyan('  Reconciling certificates...'));
    const now = this.now();
    const verdicts = this.reconciler.reconcile({
      certificates: inventory.certificates,
      domains: inventory.domains,
      hosts: inventory.hosts,
      results: allResults,
      thresholdDays: this.config.thresholdDays,
      now,
    });

    const finishedAt = this.now();
    const metadata: ScanMetadata = {
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      domainsAttempted: allResults.length,
      probeFailures: allResults.filter((r) => !isObserved(r.outcome)).length,
      thresholdDays: this.config.thresholdDays,
      deadlineReached,
    };

    const report = this.reportBuilder.build(verdicts, metadata);
    const summary = report ? report.summary : summarize(verdicts);
    logger.info(`Reconciled ${verdicts.length} certificates`, {
      expired: summary.expired,
      expiringSoon: summary['expiring-soon'],
      unknown: summary.unknown,
      ok: summary.ok,
    });

    return { report, verdicts, summary, metadata };
  }

  private async loadInventory(): Promise<Inventory> {
    try {
      const inventory = await this.deps.inventory.load();
      logger.info(`Loaded ${this.deps.inventory.description}`, {
        hosts: inventory.hosts.length,
        certificates: inventory.certificates.length,
        domains: inventory.domains.length,
      });
      return inventory;
    } catch (error) {
      if (error instanceof InventoryError) throw error;
      throw new InventoryError(`Inventory load failed: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Deliver the report once. A failure is logged and rethrown with the report
   * attached; the report itself stays valid.
   */
  private async notify(report: ScanReport, transport: NotificationTransport): Promise<void> {
    const message = renderReport(report, this.deps.render);
    try {
      await transport.send(message);
    } catch (error) {
      logger.error(`Sending notification failed: ${errorMessage(error)}`);
      const failure =
        error instanceof TransportError
          ? error
          : new TransportError(`Notification transport failed: ${errorMessage(error)}`, {
              cause: error,
            });
      failure.report = report;
      throw failure;
    }
  }

  /**
   * Output results in the specified format
   */
  private async outputResults(scan: ScanRun): Promise<void> {
    const output = this.output.format === 'json' ? this.formatJSON(scan) : this.formatText(scan);

    if (!this.output.quiet) {
      console.log(output);
    }

    if (this.output.export) {
      await writeFile(this.output.export, output, 'utf-8');
      logger.info(`Results exported to: ${this.output.export}`);
    }
  }

  private formatJSON(scan: ScanRun): string {
    return JSON.stringify(
      {
        metadata: scan.metadata,
        summary: scan.summary,
        entries: scan.report ? scan.report.entries : [],
      },
      null,
      2
    );
  }

  private formatText(scan: ScanRun): string {
    const { metadata, summary, report } = scan;
    const lines: string[] = [];
    const duration = (metadata.durationMs / 1000).toFixed(2);

    lines.push(chalk.bold('\n   Summary'));
    lines.push(chalk.gray('   ┌──────────────────────────────────────────────┐'));
    lines.push(`   │ Domains probed       : ${chalk.cyan.bold(String(metadata.domainsAttempted))}`);
    lines.push(`   │ Probe failures       : ${chalk.yellow(String(metadata.probeFailures))}`);
    lines.push(`   │ Scan duration        : ${chalk.white(`${duration}s`)}`);
    lines.push(`   │ Threshold            : ${chalk.white(`${metadata.thresholdDays} days`)}`);
    lines.push(
      `   │ Certificates         : ${chalk.red(`${summary.expired} expired`)}, ` +
        `${chalk.yellow(`${summary['expiring-soon']} expiring`)}, ` +
        `${chalk.gray(`${summary.unknown} unknown`)}, ${chalk.green(`${summary.ok} ok`)}`
    );
    if (metadata.deadlineReached) {
      lines.push(`   │ ${chalk.red.bold('Deadline reached: some domains were not probed')}`);
    }
    lines.push(chalk.gray('   └──────────────────────────────────────────────┘\n'));

    if (!report) {
      lines.push(chalk.green.bold('   No certificates require attention.\n'));
      return lines.join('\n');
    }

    report.entries.forEach((verdict, idx) => {
      const isLast = idx === report.entries.length - 1;
      const branch = isLast ? ' ' : '│';
      lines.push(
        chalk.gray(isLast ? '   └─ ' : '   ├─ ') +
          this.kindLabel(verdict) +
          ' ' +
          chalk.bold(verdict.certificate.name)
      );
      lines.push(
        chalk.gray(`   ${branch}  ├─ Host      : `) + (verdict.hostName ?? chalk.dim('unassigned'))
      );
      lines.push(
        chalk.gray(`   ${branch}  ├─ Expires   : `) +
          (verdict.effectiveExpiry && verdict.daysUntilExpiry !== null
            ? `${verdict.effectiveExpiry.toISOString()} (${describeDays(verdict.daysUntilExpiry)})`
            : chalk.dim('unknown'))
      );
      verdict.contributions.forEach((c, i) => {
        const prefix = i === verdict.contributions.length - 1 ? '└─' : '├─';
        const status = describeOutcome(c.outcome);
        lines.push(
          chalk.gray(`   ${branch}  ${prefix} `) +
            chalk.cyan(c.domain) +
            chalk.gray(' : ') +
            (isObserved(c.outcome) ? chalk.green(status) : chalk.red(status))
        );
      });
      if (!isLast) lines.push(chalk.gray('   │'));
    });
    lines.push('');

    return lines.join('\n');
  }

  private kindLabel(verdict: CertificateVerdict): string {
    switch (verdict.kind) {
      case 'expired':
        return chalk.bgRed.white.bold(' EXPIRED ');
      case 'expiring-soon':
        return chalk.bgYellow.black.bold(' EXPIRING ');
      case 'unknown':
        return chalk.bgGray.white.bold(' UNKNOWN ');
      default:
        return chalk.bgGreen.white.bold(' OK ');
    }
  }
}
