import type { OperationDescriptor, SourceBackend } from "@softcenter/shared";
import { toolForExecutable } from "../toolProbe.js";
import { createAurBackend } from "./aur.js";
import { createFileBackend } from "./file.js";
import { createFlatpakBackend } from "./flatpak.js";
import { createRepoBackend } from "./repo.js";
import { createSnapBackend } from "./snap.js";
import type { BackendPlanner, OperationPlan, PlanDiagnostic } from "./types.js";
import { PlanError, unsupported } from "./types.js";

export class BackendRegistry {
  private readonly bySource = new Map<SourceBackend, BackendPlanner>();

  register(planner: BackendPlanner): void {
    if (this.bySource.has(planner.source)) {
      throw new Error(`backend already registered: ${planner.source}`);
    }
    this.bySource.set(planner.source, planner);
  }

  get(source: SourceBackend): BackendPlanner | undefined {
    return this.bySource.get(source);
  }

  plan(descriptor: OperationDescriptor): OperationPlan {
    if (descriptor.kind === "diagnostic_fix") {
      return planDiagnosticFix(descriptor);
    }
    const planner = this.bySource.get(descriptor.source);
    if (!planner) {
      throw unsupported(descriptor);
    }
    return planner.plan(descriptor);
  }

  async preflight(descriptor: OperationDescriptor): Promise<PlanDiagnostic[]> {
    if (descriptor.kind === "diagnostic_fix") {
      return [];
    }
    const planner = this.bySource.get(descriptor.source);
    return (await planner?.preflight?.(descriptor)) ?? [];
  }
}

// Remediation commands run verbatim; only the tool check depends on argv[0].
export function planDiagnosticFix(descriptor: OperationDescriptor): OperationPlan {
  const argv = descriptor.options?.argv ?? [];
  const executable = argv[0];
  if (!executable) {
    throw new PlanError("unsupported_operation", "diagnostic_fix has no remediation command");
  }
  const tool = toolForExecutable(executable);
  return {
    steps: [{
      label: descriptor.options?.label ?? `remediation ${descriptor.target}`,
      phase: "repairing",
      candidates: [{
        argv: [...argv],
        tools: tool ? [tool] : [],
        elevation: descriptor.requiresPrivilege ? "prefix" : "never"
      }]
    }]
  };
}

export function createDefaultBackendRegistry(): BackendRegistry {
  const registry = new BackendRegistry();
  registry.register(createRepoBackend());
  registry.register(createAurBackend());
  registry.register(createFlatpakBackend());
  registry.register(createSnapBackend());
  registry.register(createFileBackend());
  return registry;
}
