/**
 * MigrationReport
 *
 * Append-only record of one migration invocation. Every entry is also
 * written to the logger as it is added.
 */

import { Logger } from '@adshift/core';
import type { ErrorKind } from '../errors/index.js';
import type {
  MigrationStage,
  RecordOutcome,
  ReportFailure,
  StageTransition,
} from '../types/index.js';

export class MigrationReport {
  private readonly _successes: string[] = [];
  private readonly _warnings: string[] = [];
  private readonly _failures: ReportFailure[] = [];
  private readonly _transitions: StageTransition[] = [];
  private readonly _outcomes: RecordOutcome[] = [];
  private readonly stages = new Map<number, MigrationStage>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger({ level: 'silent' });
  }

  get successes(): readonly string[] {
    return this._successes;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  get failures(): readonly ReportFailure[] {
    return this._failures;
  }

  get transitions(): readonly StageTransition[] {
    return this._transitions;
  }

  get outcomes(): readonly RecordOutcome[] {
    return this._outcomes;
  }

  addSuccess(message: string): void {
    this._successes.push(message);
    this.logger.info(`SUCCESS: ${message}`);
  }

  addWarning(message: string): void {
    this._warnings.push(message);
    this.logger.warn(`WARNING: ${message}`);
  }

  addFailure(message: string, errorKind: ErrorKind): void {
    this._failures.push({ message, errorKind });
    this.logger.error(`FAILURE: ${message} | Reason: ${errorKind}`);
  }

  /**
   * Move a record to its next stage
   */
  transition(recordIndex: number, to: MigrationStage): void {
    const from = this.stages.get(recordIndex);
    this._transitions.push({ recordIndex, from, to });
    this.stages.set(recordIndex, to);
    this.logger.debug(`Record ${recordIndex}: ${from ?? 'START'} -> ${to}`);
  }

  stageOf(recordIndex: number): MigrationStage | undefined {
    return this.stages.get(recordIndex);
  }

  /**
   * Record the terminal outcome of a record
   * @throws Error if the record already has one
   */
  addOutcome(outcome: RecordOutcome): void {
    if (this._outcomes.some((o) => o.recordIndex === outcome.recordIndex)) {
      throw new Error(`Record ${outcome.recordIndex} already has a terminal outcome`);
    }
    this._outcomes.push(outcome);
  }

  get hasFailures(): boolean {
    return this._failures.length > 0;
  }

  toJSON(): Record<string, unknown> {
    return {
      successes: [...this._successes],
      warnings: [...this._warnings],
      failures: this._failures.map((f) => ({ ...f })),
      outcomes: this._outcomes.map((o) => ({ ...o })),
    };
  }

  toString(): string {
    return [
      '--- Migration Report ---',
      `- Successes: ${this._successes.length}`,
      `- Warnings:  ${this._warnings.length}`,
      `- Failures:  ${this._failures.length}`,
      '------------------------',
    ].join('\n');
  }
}
