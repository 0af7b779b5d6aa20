export class StageTimer {
  private start: bigint = process.hrtime.bigint();

  begin(): void {
    this.start = process.hrtime.bigint();
  }

  /** Whole milliseconds since the last `begin` (or construction). */
  elapsedMs(): number {
    const end = process.hrtime.bigint();
    return Number((end - this.start) / 1_000_000n);
  }
}
