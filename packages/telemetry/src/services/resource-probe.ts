import type { ResourceSnapshot } from "../types.js";

/**
 * Reads process resource usage. Implementations are chosen once when the
 * performance monitor is built; callers never check for support per sample.
 */
export interface ResourceProbe {
  readonly kind: string;
  sample(): ResourceSnapshot;
  /** Names of the event-loop resources keeping the process alive. */
  activeResources(): string[];
}

const BYTES_PER_MB = 1024 * 1024;

export class NodeResourceProbe implements ResourceProbe {
  readonly kind = "node";

  private lastCpu: NodeJS.CpuUsage | null = null;
  private lastWallUs = 0;

  sample(): ResourceSnapshot {
    const wallUs = Number(process.hrtime.bigint() / 1000n);
    const cpu = process.cpuUsage();

    // First call has nothing to diff against.
    let cpuPercent: number | null = null;
    if (this.lastCpu) {
      const elapsedUs = wallUs - this.lastWallUs;
      const usedUs = cpu.user - this.lastCpu.user + (cpu.system - this.lastCpu.system);
      cpuPercent = elapsedUs > 0 ? (usedUs / elapsedUs) * 100 : 0;
    }
    this.lastCpu = cpu;
    this.lastWallUs = wallUs;

    return {
      memoryMb: process.memoryUsage().rss / BYTES_PER_MB,
      cpuPercent,
      handleCount: process.getActiveResourcesInfo().length,
    };
  }

  activeResources(): string[] {
    return process.getActiveResourcesInfo();
  }
}

/** Used where resource sampling is unwanted (tests, constrained hosts). */
export class NoopResourceProbe implements ResourceProbe {
  readonly kind = "noop";

  sample(): ResourceSnapshot {
    return { memoryMb: 0, cpuPercent: null, handleCount: 0 };
  }

  activeResources(): string[] {
    return [];
  }
}
