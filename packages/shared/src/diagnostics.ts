import type { OperationDescriptor } from "./operation.js";

export type DiagnosticStatus = "ok" | "warning" | "critical";

export type DiagnosticCheck = {
  id: string;
  name: string;
  status: DiagnosticStatus;
  detail: string;
  remediation?: OperationDescriptor;
};

export type MaintenanceAction = {
  id: string;
  label: string;
  descriptor: OperationDescriptor;
};
