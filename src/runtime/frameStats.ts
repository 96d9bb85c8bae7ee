export type FrameSample = {
  frameIndex: number;
  renderMs: number;
};

export type FrameStatsSnapshot = {
  frames: number;
  renderMsAvg: number;
  renderMsMax: number;
  /** Frames whose render time exceeded the budget (plus tolerance). */
  lateFrames: number;
};

export type FrameStatsOptions = {
  budgetMs?: number;
  tolerance?: number;
};

export type FrameClock = () => bigint;

const defaultClock: FrameClock = () => process.hrtime.bigint();

export class FrameStats {
  private readonly budgetMs: number | undefined;
  private readonly tolerance: number;
  private readonly clock: FrameClock;

  private frameCount = 0;
  private renderMsTotal = 0;
  private renderMsMax = 0;
  private lateFrames = 0;
  private frameStart: { time: bigint; frameIndex: number } | null = null;

  constructor(options: FrameStatsOptions = {}, clock: FrameClock = defaultClock) {
    this.budgetMs = options.budgetMs;
    this.tolerance = Math.max(0, options.tolerance ?? 0.1);
    this.clock = clock;
  }

  beginFrame(frameIndex: number): void {
    if (this.frameStart) {
      throw new Error('[frame-stats] beginFrame called twice without endFrame.');
    }
    this.frameStart = { time: this.clock(), frameIndex };
  }

  endFrame(): FrameSample {
    if (!this.frameStart) {
      throw new Error('[frame-stats] endFrame called without beginFrame.');
    }
    const start = this.frameStart;
    this.frameStart = null;
    const renderMs = Number(this.clock() - start.time) / 1_000_000;

    this.frameCount += 1;
    this.renderMsTotal += renderMs;
    this.renderMsMax = Math.max(this.renderMsMax, renderMs);
    if (
      typeof this.budgetMs === 'number' &&
      Number.isFinite(this.budgetMs) &&
      renderMs > this.budgetMs * (1 + this.tolerance)
    ) {
      this.lateFrames += 1;
    }
    return { frameIndex: start.frameIndex, renderMs };
  }

  snapshot(): FrameStatsSnapshot {
    const frames = this.frameCount;
    return {
      frames,
      renderMsAvg: frames > 0 ? this.renderMsTotal / frames : 0,
      renderMsMax: this.renderMsMax,
      lateFrames: this.lateFrames,
    };
  }
}

export const formatFrameStats = (snapshot: FrameStatsSnapshot): string =>
  `${snapshot.frames} frames, render avg ${snapshot.renderMsAvg.toFixed(2)}ms, max ${snapshot.renderMsMax.toFixed(2)}ms, ${snapshot.lateFrames} over budget`;
