import type { ProgressConfidence } from "@softcenter/shared";

export type ProgressPattern = {
  phase: string;
  pattern: RegExp;
};

export type ClassifiedLine = {
  phase: string;
  percent?: number;
  confidence: ProgressConfidence;
};

export const OUTPUT_PHASE = "output";

// Tool output is not a stable contract; callers may pass their own set to the executor.
export const DEFAULT_PROGRESS_PATTERNS: readonly ProgressPattern[] = [
  { phase: "resolving dependencies", pattern: /resolving dependencies|checking dependencies/i },
  { phase: "checking conflicts", pattern: /looking for conflicting packages|checking for file conflicts|checking keys|checking package integrity/i },
  { phase: "downloading", pattern: /^::\s*retrieving packages|downloading|^\s*\S+\s+[\d.]+\s*[KMG]i?B\s+[\d.]+\s*[KMG]i?B\/s/i },
  { phase: "building", pattern: /^==>\s*(making package|starting build|starting prepare|entering fakeroot)|building|compiling/i },
  { phase: "converting", pattern: /converting|creating package|generating \.PKGINFO|==>\s*extracting package data/i },
  { phase: "extracting", pattern: /extracting|unpacking/i },
  { phase: "installing", pattern: /^\(\s*\d+\/\d+\)\s*(installing|reinstalling)|^installing\b|installing\s+\S+\.\.\.|^::\s*processing package changes/i },
  { phase: "upgrading", pattern: /^\(\s*\d+\/\d+\)\s*upgrading|^::\s*starting full system upgrade|^updating\b/i },
  { phase: "removing", pattern: /^\(\s*\d+\/\d+\)\s*removing|^removing\b|^uninstalling\b/i },
  { phase: "running hooks", pattern: /running post-transaction hooks|running pre-transaction hooks/i }
];

export function classifyLine(
  line: string,
  patterns: readonly ProgressPattern[] = DEFAULT_PROGRESS_PATTERNS
): ClassifiedLine {
  const percent = extractPercent(line);
  const matched = patterns.find((item) => item.pattern.test(line));
  if (!matched) {
    return {
      phase: OUTPUT_PHASE,
      confidence: "low",
      ...(percent !== undefined ? { percent } : {})
    };
  }
  return {
    phase: matched.phase,
    confidence: "high",
    ...(percent !== undefined ? { percent } : {})
  };
}

export function extractPercent(line: string): number | undefined {
  const explicit = [...line.matchAll(/(\d{1,3})(?:\.\d+)?\s*%/g)];
  const last = explicit.at(-1);
  if (last?.[1]) {
    return clampPercent(Number(last[1]));
  }
  const counter = line.match(/^\(\s*(\d+)\s*\/\s*(\d+)\s*\)/);
  if (counter?.[1] && counter[2]) {
    const done = Number(counter[1]);
    const total = Number(counter[2]);
    if (total > 0) {
      return clampPercent(Math.floor((done / total) * 100));
    }
  }
  return undefined;
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(value)));
}
