import type {
  OperationDescriptor,
  OperationProgress,
  OperationResult,
  SlotState
} from "./operation.js";

export type OperationQueuedEvent = {
  type: "operation_queued";
  operationId: string;
  descriptor: OperationDescriptor;
  exclusive: boolean;
  position: number;
};

export type OperationStateEvent = {
  type: "operation_state";
  operationId: string;
  state: SlotState;
  message?: string;
};

export type OperationProgressEvent = {
  type: "operation_progress";
  operationId: string;
  progress: OperationProgress;
};

export type OperationResultEvent = {
  type: "operation_result";
  operationId: string;
  result: OperationResult;
};

export type OperationEvent =
  | OperationQueuedEvent
  | OperationStateEvent
  | OperationProgressEvent
  | OperationResultEvent;

export type OperationEventListener = (event: OperationEvent) => void;

export function isOperationEvent(value: unknown): value is OperationEvent {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  const type = value.type;
  return type === "operation_queued"
    || type === "operation_state"
    || type === "operation_progress"
    || type === "operation_result";
}
