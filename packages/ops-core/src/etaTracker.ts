import path from "node:path";

export type EtaSample = {
  lines: number;
  durationMs: number;
};

export type EtaEstimate = {
  percent: number;
  etaSeconds?: number;
};

export type EtaTrackerOptions = {
  maxSamples?: number;
  defaultLines?: number;
  minLines?: number;
};

/**
 * Remembers how many output lines and how long earlier runs of a command took,
 * and turns a running count into a percentage and a remaining-time guess.
 * History lives for the life of the process.
 */
export class EtaTracker {
  private readonly history = new Map<string, EtaSample[]>();
  private readonly maxSamples: number;
  private readonly defaultLines: number;
  private readonly minLines: number;

  constructor(options: EtaTrackerOptions = {}) {
    this.maxSamples = options.maxSamples ?? 20;
    this.defaultLines = options.defaultLines ?? 50;
    this.minLines = options.minLines ?? 5;
  }

  expectedLines(key: string): number {
    const samples = this.history.get(key);
    if (!samples?.length) {
      return this.defaultLines;
    }
    return Math.max(Math.floor(median(samples.map((sample) => sample.lines))), this.minLines);
  }

  expectedDurationMs(key: string): number | undefined {
    const samples = this.history.get(key);
    return samples?.length ? median(samples.map((sample) => sample.durationMs)) : undefined;
  }

  /** Capped at 99: only the result reports completion. */
  estimate(key: string, linesSeen: number, elapsedMs: number): EtaEstimate {
    const percent = Math.min(99, Math.floor((linesSeen / this.expectedLines(key)) * 100));
    const duration = this.expectedDurationMs(key);
    if (duration === undefined) {
      return { percent };
    }
    return { percent, etaSeconds: Math.max(0, Math.round((duration - elapsedMs) / 1000)) };
  }

  record(key: string, sample: EtaSample): void {
    const samples = [...(this.history.get(key) ?? []), sample];
    this.history.set(key, samples.slice(-this.maxSamples));
  }
}

// ["pacman", "-S", "--noconfirm", "vim"] -> "pacman_-S"
export function commandKey(argv: readonly string[]): string {
  const [command, ...args] = argv;
  if (!command) {
    return "unknown";
  }
  const base = path.basename(command);
  const flag = args.find((arg) => arg.startsWith("-") && !arg.startsWith("--"));
  return flag ? `${base}_${flag}` : base;
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return ((sorted[middle - 1] ?? upper) + upper) / 2;
}
