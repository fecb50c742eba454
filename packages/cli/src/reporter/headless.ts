import chalk from 'chalk';
import ora from 'ora';
import {
  formatDuration,
  type BreakdownKey,
  type CouncilOrchestrator,
  type CouncilStage,
  type CouncilStageCompleteEvent,
  type CouncilStageErrorEvent,
  type CouncilStageStartEvent,
  type CouncilStartEvent,
  type CouncilCacheHitEvent,
  type CouncilCompleteEvent,
  type SynthesisFailoverEvent,
} from '@autopsy/core';

/** The part of an ora spinner the reporter drives. */
export interface ReporterSpinner {
  text: string;
  readonly isSpinning: boolean;
  start(text?: string): unknown;
  stop(): unknown;
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
  warn(text?: string): unknown;
}

export interface HeadlessReporterOptions {
  verbose?: boolean;
  /** Line sink. Default: console.error, so stdout stays free for the report. */
  log?: (line: string) => void;
  createSpinner?: () => ReporterSpinner;
}

export const STAGE_LABELS: Record<CouncilStage, string> = {
  draft: 'Draft',
  critique: 'Critique',
  sanity: 'Sanity check',
  synthesis: 'Synthesis',
};

const PROVIDER_LABELS: Record<BreakdownKey, string> = {
  primary: 'primary',
  secondary: 'secondary',
  local: 'local model',
};

/**
 * Progress on stderr for a council run. Critique and sanity run at the same
 * time, so one spinner tracks every active stage and finished stages are
 * persisted as their own lines.
 */
export class HeadlessReporter {
  private readonly verbose: boolean;
  private readonly log: (line: string) => void;
  private readonly createSpinner: () => ReporterSpinner;
  private readonly active = new Map<CouncilStage, BreakdownKey>();
  private spinner: ReporterSpinner;
  private source?: CouncilOrchestrator;

  constructor(options: HeadlessReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.log = options.log ?? ((line: string) => console.error(line));
    this.createSpinner = options.createSpinner ?? (() => ora({ prefixText: chalk.dim(' ') }));
    this.spinner = this.createSpinner();
  }

  private readonly onStart = (event: CouncilStartEvent): void => {
    this.log('');
    this.log(chalk.cyan.bold('autopsy') + chalk.dim(' | forensic council'));
    this.log(`Company: ${chalk.green.bold(event.company)} ${chalk.dim(`(${event.ticker})`)}`);
    if (this.verbose) this.log(chalk.dim(`Cache key: ${event.key}`));
    this.log('');
  };

  private readonly onCacheHit = (event: CouncilCacheHitEvent): void => {
    this.log(chalk.dim(`  Reusing cached council output (${event.key})`));
  };

  private readonly onStageStart = (event: CouncilStageStartEvent): void => {
    this.active.set(event.stage, event.provider);
    this.refresh();
  };

  private readonly onStageComplete = (event: CouncilStageCompleteEvent): void => {
    this.finish(event.stage, spinner => spinner.succeed(
      `${this.describe(event.stage, event.provider)}${chalk.dim(`  ${formatDuration(event.latencyMs)}`)}`,
    ));
  };

  private readonly onStageError = (event: CouncilStageErrorEvent): void => {
    const detail = this.verbose ? event.error : event.error.split(' | ')[0];
    this.finish(event.stage, spinner => spinner.fail(
      `${this.describe(event.stage, event.provider)} ${chalk.red(detail)}`,
    ));
  };

  private readonly onFailover = (event: SynthesisFailoverEvent): void => {
    this.finish(undefined, spinner => spinner.warn(
      `Synthesis routed from ${event.from} to ${event.to}: ${chalk.yellow(event.reason)}`,
    ));
  };

  private readonly onComplete = (event: CouncilCompleteEvent): void => {
    this.spinner.stop();
    this.active.clear();

    const output = event.output;
    this.log('');
    if (event.usedFallback) {
      this.log(chalk.yellow.bold('! Council degraded to the consensus fallback'));
    } else {
      this.log(chalk.green.bold('✓ Council complete'));
    }
    this.log(chalk.dim(`  Overall confidence: ${Math.round(output.overall_confidence * 100)}%`));
    this.log(chalk.dim(`  Claims: ${output.failure_drivers.length} drivers, ${output.survivor_strategies.length} strategies`));
    this.log(chalk.dim(`  Evidence: ${output.signal_summary.snippet_count} snippets from ${output.signal_summary.source_count} sources`));
    this.log(chalk.dim(`  Duration: ${formatDuration(event.durationMs)}`));
    this.log('');
  };

  attach(source: CouncilOrchestrator): this {
    this.detach();
    this.source = source;
    source.on('council:start', this.onStart);
    source.on('council:cache-hit', this.onCacheHit);
    source.on('stage:start', this.onStageStart);
    source.on('stage:complete', this.onStageComplete);
    source.on('stage:error', this.onStageError);
    source.on('synthesis:failover', this.onFailover);
    source.on('council:complete', this.onComplete);
    return this;
  }

  detach(): void {
    const source = this.source;
    if (!source) return;
    source.off('council:start', this.onStart);
    source.off('council:cache-hit', this.onCacheHit);
    source.off('stage:start', this.onStageStart);
    source.off('stage:complete', this.onStageComplete);
    source.off('stage:error', this.onStageError);
    source.off('synthesis:failover', this.onFailover);
    source.off('council:complete', this.onComplete);
    this.spinner.stop();
    this.source = undefined;
  }

  private describe(stage: CouncilStage, provider: BreakdownKey): string {
    return `${chalk.bold(STAGE_LABELS[stage])} ${chalk.dim(`(${PROVIDER_LABELS[provider]})`)}`;
  }

  private activeText(): string {
    return [...this.active].map(([stage, provider]) => this.describe(stage, provider)).join(chalk.dim(', '));
  }

  /** Persist one line for a finished stage, then resume the spinner for what is still running. */
  private finish(stage: CouncilStage | undefined, persist: (spinner: ReporterSpinner) => void): void {
    if (stage) this.active.delete(stage);
    this.spinner.stop();
    persist(this.createSpinner());
    this.refresh();
  }

  private refresh(): void {
    if (this.active.size === 0) {
      this.spinner.stop();
      return;
    }
    const text = this.activeText();
    if (this.spinner.isSpinning) {
      this.spinner.text = text;
    } else {
      this.spinner.start(text);
    }
  }
}
