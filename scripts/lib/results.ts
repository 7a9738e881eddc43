import { groupBy } from 'lodash';

export type ItemStatus = 'success' | 'warning' | 'failed' | 'skipped';

export interface ItemResult {
  step: string;
  item: string;
  status: ItemStatus;
  reason?: string;
  rows?: number;
}

const STATUS_SYMBOL: Record<ItemStatus, string> = {
  success: '✅',
  warning: '⚠️ ',
  failed: '❌',
  skipped: '⏭️ ',
};

/**
 * Accumulates per-item outcomes of a batch run. A failed item never stops the batch;
 * the run fails at the end when any item failed.
 */
export class BatchResults {
  private readonly items: ItemResult[] = [];

  record(result: ItemResult): void {
    this.items.push(result);
  }

  success(step: string, item: string, rows?: number): void {
    this.record({ step, item, status: 'success', rows });
  }

  warning(step: string, item: string, reason: string): void {
    this.record({ step, item, status: 'warning', reason });
  }

  failure(step: string, item: string, reason: string): void {
    this.record({ step, item, status: 'failed', reason });
  }

  skipped(step: string, item: string, reason: string): void {
    this.record({ step, item, status: 'skipped', reason });
  }

  all(): ItemResult[] {
    return [...this.items];
  }

  failures(): ItemResult[] {
    return this.items.filter(i => i.status === 'failed');
  }

  count(status: ItemStatus): number {
    return this.items.filter(i => i.status === status).length;
  }

  hasFailures(): boolean {
    return this.failures().length > 0;
  }

  exitCode(): number {
    return this.hasFailures() ? 1 : 0;
  }

  /** Summary lines grouped by step, in the order steps were first recorded. */
  summaryLines(): string[] {
    const lines: string[] = [];
    const byStep = groupBy(this.items, item => item.step);

    for (const [step, items] of Object.entries(byStep)) {
      lines.push(`${step}:`);
      for (const item of items) {
        const rows = item.rows !== undefined ? ` (${item.rows.toLocaleString('en-US')} rows)` : '';
        const reason = item.reason ? ` - ${item.reason}` : '';
        lines.push(`  ${STATUS_SYMBOL[item.status]} ${item.item}${rows}${reason}`);
      }
    }
    return lines;
  }

  printSummary(): void {
    console.log('\n📋 Summary');
    console.log('════════════════════════════════════════════════════════════════');
    for (const line of this.summaryLines()) {
      console.log(line);
    }
    console.log('════════════════════════════════════════════════════════════════');
  }
}
