import type { SpawnFn, SpawnRunOptions, SpawnRunResult } from "../src/processRunner.js";
import type { ToolAvailability, ToolAvailabilityMap, ToolName, ToolProber } from "../src/toolProbe.js";
import { TOOL_CATALOG } from "../src/toolProbe.js";

export type SpawnCall = {
  command: string;
  args: string[];
  options: SpawnRunOptions;
};

export function spawnResult(partial: Partial<SpawnRunResult> = {}): SpawnRunResult {
  return {
    code: 0,
    signal: null,
    cancelled: false,
    timedOut: false,
    stalled: false,
    outputTail: "",
    ...partial
  };
}

type SpawnHandler = (call: SpawnCall) => SpawnRunResult | Promise<SpawnRunResult>;

export function recordingSpawn(handler: SpawnHandler): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = async (command, args, options) => {
    const call = { command, args: [...args], options };
    calls.push(call);
    return await handler(call);
  };
  return { spawn, calls };
}

export class StaticProber implements ToolProber {
  readonly probed: ToolName[] = [];
  refreshCount = 0;

  constructor(private readonly installed: ReadonlySet<ToolName>) {}

  async probe(tool: ToolName): Promise<ToolAvailability> {
    this.probed.push(tool);
    const entry = TOOL_CATALOG[tool];
    return this.installed.has(tool)
      ? { tool, installed: true, executablePath: `/usr/bin/${entry.executable}`, resolutionHint: entry.resolutionHint }
      : { tool, installed: false, resolutionHint: entry.resolutionHint };
  }

  async probeAll(tools: readonly ToolName[]): Promise<ToolAvailabilityMap> {
    const map: ToolAvailabilityMap = {};
    for (const tool of tools) {
      map[tool] = await this.probe(tool);
    }
    return map;
  }

  refresh(): void {
    this.refreshCount += 1;
  }
}
