/**
 * Progress Reporter for EAVS scripts
 * Symbol-prefixed console output: boxed run headers, step banners, per-item lines
 */

export interface SummaryCounts {
  succeeded: number;
  warnings: number;
  failed: number;
}

const BOX_WIDTH = 64;

function boxLine(text: string): string {
  return `║  ${text.padEnd(BOX_WIDTH - 2)}║`;
}

export class ProgressReporter {
  private startTime: Date | null = null;

  constructor(private readonly debugMode: boolean = false) {}

  /**
   * Log the start of a run
   */
  logRunStart(title: string, details: Record<string, string | number> = {}): void {
    this.startTime = new Date();
    console.log(`\n╔${'═'.repeat(BOX_WIDTH)}╗`);
    console.log(boxLine(title));
    console.log(`╚${'═'.repeat(BOX_WIDTH)}╝`);
    for (const [label, value] of Object.entries(details)) {
      console.log(`  ${`${label}:`.padEnd(14)}${value}`);
    }
    console.log(`  ${'Started:'.padEnd(14)}${this.startTime.toISOString()}`);
    console.log('');
  }

  /**
   * Log the start of a step
   */
  logStep(step: string, stepNumber: number, totalSteps: number): void {
    console.log('');
    console.log('━'.repeat(BOX_WIDTH));
    console.log(`📦 Step ${stepNumber}/${totalSteps}: ${step}`);
    console.log('━'.repeat(BOX_WIDTH));
    console.log('');
  }

  /** Heading for one section, view or year inside a step. */
  logItem(label: string): void {
    console.log(`\n🔧 ${label}`);
  }

  logSuccess(message: string): void {
    console.log(`  ✅ ${message}`);
  }

  logError(message: string): void {
    console.log(`  ❌ ${message}`);
  }

  logWarning(message: string): void {
    console.log(`  ⚠️  ${message}`);
  }

  logInfo(message: string): void {
    console.log(`  ℹ️  ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string): void {
    if (this.debugMode) {
      console.log(`  🐛 DEBUG: ${message}`);
    }
  }

  logRows(label: string, rows: number): void {
    console.log(`  📊 ${label}: ${this.formatNumber(rows)} rows`);
  }

  /**
   * Log run completion with a summary block
   */
  logRunComplete(title: string, counts: SummaryCounts): void {
    const failed = counts.failed > 0;
    console.log(`\n╔${'═'.repeat(BOX_WIDTH)}╗`);
    console.log(boxLine(`${title} ${failed ? 'FINISHED WITH FAILURES' : 'Completed'}`));
    console.log(`╚${'═'.repeat(BOX_WIDTH)}╝`);
    console.log(`  ✅ Succeeded: ${counts.succeeded}`);
    console.log(`  ⚠️  Warnings:  ${counts.warnings}`);
    console.log(`  ❌ Failed:    ${counts.failed}`);
    if (this.startTime) {
      const duration = (Date.now() - this.startTime.getTime()) / 1000;
      console.log(`  Duration:     ${this.formatDuration(duration)}`);
    }
    console.log('');
  }

  /**
   * Format a number with thousand separators
   */
  formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
