import type { OperationDescriptor, OperationKind, SourceBackend } from "@softcenter/shared";
import type { ElevationStyle } from "../privilegeBroker.js";
import type { ToolName } from "../toolProbe.js";

// Placeholders the executor substitutes inside argv entries.
export const WORKDIR_PLACEHOLDER = "{workdir}";
export const ARTIFACT_PLACEHOLDER = "{artifact}";

export type CommandCandidate = {
  argv: string[];
  tools: ToolName[];
  elevation: ElevationStyle;
  // defaults to the operation's work directory
  cwd?: string;
};

export type PlanStep = {
  label: string;
  phase: string;
  candidates: CommandCandidate[];
};

export type OperationPlan = {
  steps: PlanStep[];
};

export type PlanDiagnostic = {
  code: string;
  message: string;
  severity: "info" | "warn" | "error";
  recoverable: boolean;
};

export type PlanErrorCode = "unsupported_operation";

export class PlanError extends Error {
  constructor(
    readonly code: PlanErrorCode,
    message: string
  ) {
    super(message);
    this.name = "PlanError";
  }
}

export interface BackendPlanner {
  readonly source: SourceBackend;
  plan(descriptor: OperationDescriptor): OperationPlan;
  preflight?(descriptor: OperationDescriptor): Promise<PlanDiagnostic[]>;
}

export function unsupported(descriptor: OperationDescriptor): PlanError {
  return new PlanError(
    "unsupported_operation",
    `${descriptor.kind} is not supported for ${descriptor.source} targets`
  );
}

export function singleStep(
  label: string,
  phase: string,
  candidate: CommandCandidate
): OperationPlan {
  return { steps: [{ label, phase, candidates: [candidate] }] };
}

export function splitTargets(target: string): string[] {
  return target.split(/\s+/).filter(Boolean);
}

export function phaseForKind(kind: OperationKind): string {
  switch (kind) {
    case "install":
    case "move":
      return "installing";
    case "remove":
      return "removing";
    case "update":
      return "upgrading";
    case "convert":
      return "converting";
    case "diagnostic_fix":
      return "repairing";
    case "search":
      return "searching";
    case "list":
      return "listing";
  }
}
