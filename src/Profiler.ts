interface KindStats {
  totalMs: number;
  calls: number;
}

/**
 * Accumulates time spent in the reduction rule of each element kind.
 * Enabled with FMIMD_PROFILE=1.
 */
export class ReductionProfiler {
  private readonly stats = new Map<string, KindStats>();

  public start(): number {
    return (globalThis.performance?.now?.() ?? Date.now());
  }

  public end(kind: string, t0: number): void {
    const elapsed = (globalThis.performance?.now?.() ?? Date.now()) - t0;
    const entry = this.stats.get(kind);
    if (entry) {
      entry.totalMs += elapsed;
      entry.calls++;
    } else {
      this.stats.set(kind, { totalMs: elapsed, calls: 1 });
    }
  }

  public callCount(kind: string): number {
    return this.stats.get(kind)?.calls ?? 0;
  }

  /**
   * One line per element kind, slowest first; empty when nothing was recorded.
   */
  public formatReport(title: string): string[] {
    if (this.stats.size === 0) return [];
    const kinds = [...this.stats.entries()].sort((a, b) => b[1].totalMs - a[1].totalMs);
    const width = Math.max(...kinds.map(([kind]) => kind.length));
    return [
      `Reduction profile for ${title}:`,
      ...kinds.map(([kind, { totalMs, calls }]) =>
        `  ${kind.padEnd(width)} ${String(calls).padStart(6)} calls ${totalMs.toFixed(3)} ms (${(totalMs / calls).toFixed(3)} ms each)`
      )
    ];
  }

  public print(title: string): void {
    const lines = this.formatReport(title);
    if (lines.length > 0) console.log(lines.join('\n'));
  }
}
