export type OperationKind =
  | "install"
  | "remove"
  | "convert"
  | "move"
  | "diagnostic_fix"
  | "update"
  | "search"
  | "list";

export type SourceBackend = "repo" | "aur" | "flatpak" | "snap" | "file";

export type OperationOptions = {
  destination?: string;
  origin?: string;
  argv?: readonly string[];
  label?: string;
};

export type OperationDescriptor = Readonly<{
  kind: OperationKind;
  target: string;
  source: SourceBackend;
  requiresPrivilege: boolean;
  options?: Readonly<OperationOptions>;
}>;

export type ProgressConfidence = "high" | "low";

export type OperationProgress = {
  operationId: string;
  phase: string;
  percent?: number;
  // seconds left, from the durations of earlier runs of the same command
  etaSeconds?: number;
  message: string;
  timestamp: string;
  confidence: ProgressConfidence;
};

export type OperationStatus = "success" | "failed" | "cancelled";

export type OperationErrorKind =
  | "tool_missing"
  | "authorization_denied"
  | "authorization_timeout"
  | "no_privilege_mechanism"
  | "execution_failed"
  | "cancelled"
  | "timeout"
  | "unsupported_operation";

export type OperationResult = {
  operationId: string;
  status: OperationStatus;
  exitCode: number | null;
  errorKind?: OperationErrorKind;
  errorDetail?: string;
  finishedAt: string;
};

export type SlotState = "queued" | "authorizing" | "running" | "cancelling" | "finished";

export type SlotSnapshot = {
  operationId: string;
  descriptor: OperationDescriptor;
  state: SlotState;
  exclusive: boolean;
  enqueuedAt: string;
  startedAt?: string;
  result?: OperationResult;
};

export const OPERATION_KINDS: readonly OperationKind[] = [
  "install",
  "remove",
  "convert",
  "move",
  "diagnostic_fix",
  "update",
  "search",
  "list"
];

export const SOURCE_BACKENDS: readonly SourceBackend[] = ["repo", "aur", "flatpak", "snap", "file"];

const READ_ONLY_KINDS: ReadonlySet<OperationKind> = new Set(["search", "list"]);
const PACKAGE_DATABASE_SOURCES: ReadonlySet<SourceBackend> = new Set(["repo", "aur", "file"]);

export type DescriptorErrorCode =
  | "invalid_kind"
  | "invalid_source"
  | "empty_target"
  | "unsupported_combination"
  | "missing_argv"
  | "read_only_privilege"
  | "fix_requires_privilege";

export class DescriptorError extends Error {
  constructor(
    readonly code: DescriptorErrorCode,
    message: string
  ) {
    super(message);
    this.name = "DescriptorError";
  }
}

export type OperationDescriptorInput = {
  kind: string;
  target: string;
  source: string;
  requiresPrivilege?: boolean;
  options?: OperationOptions;
};

export function createOperationDescriptor(input: OperationDescriptorInput): OperationDescriptor {
  const kind = parseOperationKind(input.kind);
  if (!kind) {
    throw new DescriptorError("invalid_kind", `unknown operation kind: ${input.kind}`);
  }
  const source = parseSourceBackend(input.source);
  if (!source) {
    throw new DescriptorError("invalid_source", `unknown source backend: ${input.source}`);
  }
  const target = input.target.trim();
  if (!target && kind !== "list" && kind !== "update") {
    throw new DescriptorError("empty_target", `${kind} requires a target`);
  }
  if (kind === "convert" && source !== "file") {
    throw new DescriptorError("unsupported_combination", "convert only applies to local files");
  }
  if (kind === "move" && source !== "flatpak") {
    throw new DescriptorError("unsupported_combination", "move only applies to flatpak apps");
  }
  if (kind === "move" && !input.options?.destination?.trim()) {
    throw new DescriptorError("unsupported_combination", "move requires a destination installation");
  }
  const argv = input.options?.argv?.map((arg) => arg.trim()).filter(Boolean);
  if (kind === "diagnostic_fix" && (!argv || argv.length === 0)) {
    throw new DescriptorError("missing_argv", "diagnostic_fix requires a remediation command");
  }
  if (kind === "diagnostic_fix" && input.requiresPrivilege === false) {
    throw new DescriptorError("fix_requires_privilege", "diagnostic_fix always runs with privilege");
  }
  const requiresPrivilege = input.requiresPrivilege ?? defaultRequiresPrivilege(kind, source);
  if (READ_ONLY_KINDS.has(kind) && requiresPrivilege) {
    throw new DescriptorError("read_only_privilege", `${kind} never requires privilege`);
  }

  const options = normalizeOptions(input.options, argv);
  return Object.freeze({
    kind,
    target,
    source,
    requiresPrivilege,
    ...(options ? { options } : {})
  });
}

export function isMutatingKind(kind: OperationKind): boolean {
  return !READ_ONLY_KINDS.has(kind);
}

// Mutating work against the pacman database is serialized even when it runs unprivileged
// (AUR helpers elevate themselves), so the exclusive slot covers it too.
export function isExclusiveDescriptor(descriptor: OperationDescriptor): boolean {
  if (!isMutatingKind(descriptor.kind)) {
    return false;
  }
  return descriptor.requiresPrivilege || PACKAGE_DATABASE_SOURCES.has(descriptor.source);
}

export function defaultRequiresPrivilege(kind: OperationKind, source: SourceBackend): boolean {
  if (READ_ONLY_KINDS.has(kind)) {
    return false;
  }
  if (kind === "diagnostic_fix") {
    return true;
  }
  return source === "repo" || source === "aur" || source === "file" || source === "snap";
}

export function describeOperation(descriptor: OperationDescriptor): string {
  const label = descriptor.options?.label?.trim();
  if (label) {
    return label;
  }
  const target = descriptor.target || "*";
  return `${descriptor.kind} ${descriptor.source}:${target}`;
}

export function parseOperationKind(raw: string): OperationKind | undefined {
  const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
  return OPERATION_KINDS.find((kind) => kind === normalized);
}

export function parseSourceBackend(raw: string): SourceBackend | undefined {
  const normalized = raw.trim().toLowerCase();
  return SOURCE_BACKENDS.find((source) => source === normalized);
}

function normalizeOptions(
  options: OperationOptions | undefined,
  argv: string[] | undefined
): Readonly<OperationOptions> | undefined {
  if (!options) {
    return undefined;
  }
  const normalized: OperationOptions = {};
  if (options.destination?.trim()) {
    normalized.destination = options.destination.trim();
  }
  if (options.origin?.trim()) {
    normalized.origin = options.origin.trim();
  }
  if (argv && argv.length > 0) {
    normalized.argv = Object.freeze([...argv]);
  }
  if (options.label?.trim()) {
    normalized.label = options.label.trim();
  }
  return Object.keys(normalized).length > 0 ? Object.freeze(normalized) : undefined;
}
