import type { OperationEvent } from "./events.js";
import type { OperationDescriptorInput } from "./operation.js";

export type ClientSubmit = {
  type: "operation.submit";
  requestId?: string;
  descriptor: OperationDescriptorInput;
};

export type ClientCancel = {
  type: "operation.cancel";
  operationId: string;
};

export type ClientEnvelope = ClientSubmit | ClientCancel;

export type DaemonHello = {
  type: "daemon.hello";
  version: string;
  connectedAt: string;
};

export type DaemonOperationEvent = {
  type: "operation.event";
  event: OperationEvent;
};

export type DaemonAccepted = {
  type: "operation.accepted";
  requestId?: string;
  operationId: string;
  duplicate: boolean;
};

export type DaemonRejected = {
  type: "operation.rejected";
  requestId?: string;
  operationId?: string;
  error: string;
  detail?: string;
};

export type DaemonEnvelope = DaemonHello | DaemonOperationEvent | DaemonAccepted | DaemonRejected;

export function parseClientEnvelope(raw: string): ClientEnvelope | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) {
    return undefined;
  }
  const candidate = parsed;
  if (candidate.type === "operation.cancel") {
    return typeof candidate.operationId === "string" && candidate.operationId.trim()
      ? { type: "operation.cancel", operationId: candidate.operationId.trim() }
      : undefined;
  }
  if (candidate.type !== "operation.submit") {
    return undefined;
  }
  const descriptor = toDescriptorInput(candidate.descriptor);
  if (!descriptor) {
    return undefined;
  }
  const requestId = typeof candidate.requestId === "string" && candidate.requestId.trim()
    ? candidate.requestId.trim()
    : undefined;
  return { type: "operation.submit", requestId, descriptor };
}

export function toDescriptorInput(value: unknown): OperationDescriptorInput | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const raw = value;
  if (typeof raw.kind !== "string" || typeof raw.source !== "string") {
    return undefined;
  }
  const target = typeof raw.target === "string" ? raw.target : "";
  const input: OperationDescriptorInput = {
    kind: raw.kind,
    source: raw.source,
    target
  };
  if (typeof raw.requiresPrivilege === "boolean") {
    input.requiresPrivilege = raw.requiresPrivilege;
  }
  if (isRecord(raw.options)) {
    const options = raw.options;
    input.options = {
      destination: typeof options.destination === "string" ? options.destination : undefined,
      origin: typeof options.origin === "string" ? options.origin : undefined,
      label: typeof options.label === "string" ? options.label : undefined,
      argv: Array.isArray(options.argv)
        ? options.argv.filter((arg): arg is string => typeof arg === "string")
        : undefined
    };
  }
  return input;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
