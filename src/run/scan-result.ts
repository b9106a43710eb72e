/**
 * Incremental ScanResult construction for one (site, resource type) pass.
 *
 * @module run/scan-result
 */

import { describeError } from '../errors.js';
import { isFlagged } from '../policy/policy-evaluator.js';
import type {
  ResourceRecord,
  ResourceType,
  ScanResult,
  ScanStatus,
  ScannedItem,
  SiteDescriptor,
  Verdict,
} from '../types.js';

export class ScanResultBuilder {
  private readonly items: ScannedItem[] = [];
  private flagged = 0;
  private warnings = 0;
  private errors = 0;
  private lastError: string | undefined;
  private finalized = false;

  constructor(
    readonly site: SiteDescriptor,
    readonly resourceType: ResourceType,
    private readonly startedAt: Date,
    private readonly now: () => number = Date.now,
  ) {}

  get errorCount(): number {
    return this.errors;
  }

  add(record: ResourceRecord, verdict: Verdict): void {
    this.assertOpen();
    this.items.push(Object.freeze({ record, verdict }));
    // Records with a data-quality warning never count as flagged
    if (isFlagged(verdict)) this.flagged++;
    if (verdict.warning) this.warnings++;
  }

  recordError(error: unknown): void {
    this.assertOpen();
    this.errors++;
    this.lastError = describeError(error);
  }

  finalize(status: ScanStatus): ScanResult {
    this.assertOpen();
    this.finalized = true;
    return Object.freeze({
      site: this.site,
      resourceType: this.resourceType,
      items: Object.freeze([...this.items]),
      startedAt: this.startedAt,
      durationMs: Math.max(0, this.now() - this.startedAt.getTime()),
      recordCount: this.items.length,
      flaggedCount: this.flagged,
      warningCount: this.warnings,
      errorCount: this.errors,
      status,
      ...(this.lastError !== undefined && status !== 'completed' ? { error: this.lastError } : {}),
    });
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error(`ScanResult for ${this.resourceType}@${this.site.name} already finalized`);
    }
  }
}
