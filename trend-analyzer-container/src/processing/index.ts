/**
 * Central export for all processing modules
 */

export * from './text';
export * from './record-schema';
export * from './cleaner';
export * from './enricher';
export * from './optimizer';
export * from './quality-assessor';
export * from './context-assembler';

import { TrendsCleaner } from './cleaner';
import { TrendsEnricher } from './enricher';
import { TaskOptimizer } from './optimizer';
import { QualityAssessor } from './quality-assessor';
import { ContextAssembler } from './context-assembler';
import { parseRawTrendsRecord } from './record-schema';
import { DEFAULT_PIPELINE_CONFIG, PipelineConfig } from '../config';
import {
  AssembledContext,
  CleanedTrendsRecord,
  CleaningReport,
  EnrichedInsights,
  QualityAssessment,
  TASK_NAMES,
  TaskName,
  ViewForTask,
  valueOr,
} from '../types';

export type PipelineStage = 'clean' | 'enrich' | 'assess' | 'optimize' | 'assemble';

export interface StageCheckpoint {
  stage: PipelineStage;
  phase: 'start' | 'end';
  task?: string;
}

export type StageListener = (checkpoint: StageCheckpoint) => void;

export type PipelineLogger = Pick<Console, 'log' | 'warn'>;

export interface ProcessingPipelineOptions {
  onStage?: StageListener;
  logger?: PipelineLogger;
}

/**
 * Everything derived from one raw record, shared by every task of a run
 */
export interface PreparedTrends {
  record: CleanedTrendsRecord;
  report: CleaningReport;
  insights: EnrichedInsights;
  quality: QualityAssessment;
}

/**
 * Processing Pipeline Orchestrator
 *
 * Coordinates the data processing pipeline:
 * Clean -> (Enrich, Assess) -> Optimize -> Assemble
 *
 * The stages are pure; this class only sequences them, reports stage
 * boundaries and logs what the cleaner had to adjust.
 */
export class ProcessingPipeline {
  private cleaner: TrendsCleaner;
  private enricher: TrendsEnricher;
  private assessor: QualityAssessor;
  private optimizer: TaskOptimizer;
  private assembler: ContextAssembler;
  private onStage?: StageListener;
  private logger: PipelineLogger;

  constructor(config: PipelineConfig = DEFAULT_PIPELINE_CONFIG, options: ProcessingPipelineOptions = {}) {
    this.cleaner = new TrendsCleaner();
    this.enricher = new TrendsEnricher(config);
    this.assessor = new QualityAssessor(config);
    this.optimizer = new TaskOptimizer(config);
    this.assembler = new ContextAssembler(config);
    this.onStage = options.onStage;
    this.logger = options.logger ?? console;
  }

  /**
   * Validate, clean, enrich and assess a raw record
   *
   * @throws MalformedRecordError when the input breaks the record contract
   */
  prepare(input: unknown): PreparedTrends {
    const raw = parseRawTrendsRecord(input);
    const label = raw.keyword ? `'${raw.keyword}'` : '(no keyword)';
    this.logger.log(`\n=== Preparing trends context for ${label} ===`);

    const { record, report } = this.runStage('clean', undefined, () => this.cleaner.cleanWithReport(raw));
    this.logger.log(
      `✓ Cleaned: ${valueOr(record.interestOverTime, []).length} interest points, ` +
        `${valueOr(record.topQueries, []).length} top queries, ` +
        `${valueOr(record.risingQueries, []).length} rising queries`
    );
    this.logAdjustments(report);

    const insights = this.runStage('enrich', undefined, () => this.enricher.enrich(record));
    this.logger.log(
      `✓ Enriched: trend ${insights.trend.direction}, ${insights.problemIndicators.length} problem indicators, ` +
        `${insights.keywordClusters.length} clusters`
    );

    const quality = this.runStage('assess', undefined, () => this.assessor.assess(record, report));
    this.logger.log(`✓ Data completeness: ${quality.data_completeness_score.toFixed(2)}`);
    quality.recommendations.forEach((recommendation) => this.logger.warn(`⚠️  ${recommendation}`));

    return { record, report, insights, quality };
  }

  /**
   * Build the assembled context for one task from prepared data
   *
   * @throws InvalidTaskError when `task` is not a registered task
   */
  buildContext(prepared: PreparedTrends, task: string): AssembledContext {
    const view = this.runStage('optimize', task, () =>
      this.optimizer.optimize(prepared.record, prepared.insights, task)
    );
    return this.runStage('assemble', task, () => this.assembler.assemble(view, prepared.quality, prepared.insights));
  }

  /**
   * Typed variant of `buildContext` for callers that know the task statically
   */
  buildTaskContext<T extends TaskName>(prepared: PreparedTrends, task: T): AssembledContext<ViewForTask<T>> {
    const view = this.runStage('optimize', task, () =>
      this.optimizer.optimizeFor(prepared.record, prepared.insights, task)
    );
    return this.runStage('assemble', task, () => this.assembler.assemble(view, prepared.quality, prepared.insights));
  }

  /**
   * Prepare a raw record and build the context for one task
   */
  build(input: unknown, task: string): AssembledContext {
    return this.buildContext(this.prepare(input), task);
  }

  /**
   * Prepare once and build a context per task
   */
  buildAll(input: unknown, tasks: readonly TaskName[] = TASK_NAMES): AssembledContext[] {
    const prepared = this.prepare(input);
    return tasks.map((task) => this.buildContext(prepared, task));
  }

  taskBound(task: string): number {
    return this.optimizer.taskBound(task);
  }

  private runStage<T>(stage: PipelineStage, task: string | undefined, run: () => T): T {
    this.onStage?.({ stage, phase: 'start', task });
    const result = run();
    this.onStage?.({ stage, phase: 'end', task });
    return result;
  }

  private logAdjustments(report: CleaningReport): void {
    if (report.clampedValues > 0) {
      this.logger.warn(`⚠️  Clamped ${report.clampedValues} out-of-range interest values`);
    }
    if (report.droppedPoints > 0) {
      this.logger.warn(`⚠️  Dropped ${report.droppedPoints} points or regions without a usable date, name or value`);
    }
    if (report.droppedQueries > 0) {
      this.logger.warn(`⚠️  Dropped ${report.droppedQueries} empty or unreadable queries`);
    }
    if (report.duplicateQueries > 0) {
      this.logger.log(`Merged ${report.duplicateQueries} duplicate queries`);
    }
  }
}
