import { randomUUID } from "node:crypto";
import {
  describeOperation,
  isExclusiveDescriptor,
  type OperationDescriptor,
  type OperationEvent,
  type OperationEventListener,
  type OperationResult,
  type SlotSnapshot,
  type SlotState
} from "@softcenter/shared";
import { buildResult, type OperationRunner } from "./executor.js";
import { createLogger, type Logger } from "./logger.js";
import { PrivilegeError, type AuthorizationHandle, type PrivilegeAuthorizer } from "./privilegeBroker.js";

export type QueueErrorCode = "not_found" | "not_cancellable" | "closed";

export class QueueError extends Error {
  constructor(
    readonly code: QueueErrorCode,
    message: string
  ) {
    super(message);
    this.name = "QueueError";
  }
}

type Slot = {
  operationId: string;
  descriptor: OperationDescriptor;
  exclusive: boolean;
  state: SlotState;
  enqueuedAt: string;
  startedAt?: string;
  result?: OperationResult;
  controller: AbortController;
  done: Promise<OperationResult>;
  resolve: (result: OperationResult) => void;
};

const SLOT_TRANSITIONS: Record<SlotState, readonly SlotState[]> = {
  queued: ["authorizing", "cancelling", "finished"],
  authorizing: ["running", "cancelling", "finished"],
  running: ["cancelling", "finished"],
  cancelling: ["finished"],
  finished: []
};

export function canTransitionSlotState(from: SlotState, to: SlotState): boolean {
  return SLOT_TRANSITIONS[from].includes(to);
}

export type OperationQueueOptions = {
  broker: PrivilegeAuthorizer;
  executor: OperationRunner;
  retainedResults?: number;
  idFactory?: () => string;
  logger?: Logger;
};

export class OperationQueue {
  private readonly slots = new Map<string, Slot>();
  private readonly pending: Slot[] = [];
  private readonly finishedOrder: string[] = [];
  private readonly listeners = new Set<OperationEventListener>();
  private readonly broker: PrivilegeAuthorizer;
  private readonly executor: OperationRunner;
  private readonly retainedResults: number;
  private readonly idFactory: () => string;
  private readonly logger: Logger;
  private activeExclusive?: Slot;
  private closed = false;

  constructor(options: OperationQueueOptions) {
    this.broker = options.broker;
    this.executor = options.executor;
    this.retainedResults = Math.max(1, options.retainedResults ?? 500);
    this.idFactory = options.idFactory ?? randomUUID;
    this.logger = options.logger ?? createLogger("operation-queue");
  }

  submit(descriptor: OperationDescriptor): string {
    if (this.closed) {
      throw new QueueError("closed", "operation queue is closed");
    }
    const operationId = this.idFactory();
    let resolve: (result: OperationResult) => void = () => undefined;
    const done = new Promise<OperationResult>((res) => {
      resolve = res;
    });
    const slot: Slot = {
      operationId,
      descriptor,
      exclusive: isExclusiveDescriptor(descriptor),
      state: "queued",
      enqueuedAt: new Date().toISOString(),
      controller: new AbortController(),
      done,
      resolve
    };
    this.slots.set(operationId, slot);

    if (slot.exclusive) {
      this.pending.push(slot);
    }
    const position = slot.exclusive
      ? this.pending.length - 1 + (this.activeExclusive ? 1 : 0)
      : 0;
    this.logger.info(
      {
        operationId,
        kind: descriptor.kind,
        source: descriptor.source,
        exclusive: slot.exclusive,
        position
      },
      `queued ${describeOperation(descriptor)}`
    );
    this.emit({
      type: "operation_queued",
      operationId,
      descriptor,
      exclusive: slot.exclusive,
      position
    });

    if (slot.exclusive) {
      this.processQueue();
    } else {
      this.start(slot);
    }
    return operationId;
  }

  cancel(operationId: string): void {
    const slot = this.slots.get(operationId);
    if (!slot) {
      throw new QueueError("not_found", `unknown operation: ${operationId}`);
    }
    if (slot.state === "finished") {
      throw new QueueError("not_cancellable", `operation already finished: ${operationId}`);
    }
    if (slot.state === "cancelling") {
      return;
    }
    if (slot.state === "queued") {
      const idx = this.pending.indexOf(slot);
      if (idx >= 0) {
        this.pending.splice(idx, 1);
      }
      slot.controller.abort();
      this.retire(slot, buildResult(operationId, "cancelled", null, "cancelled", "cancelled while queued"));
      return;
    }
    this.transition(slot, "cancelling");
    slot.controller.abort();
  }

  status(operationId: string): SlotSnapshot | undefined {
    const slot = this.slots.get(operationId);
    return slot ? snapshot(slot) : undefined;
  }

  async result(operationId: string): Promise<OperationResult> {
    const slot = this.slots.get(operationId);
    if (!slot) {
      throw new QueueError("not_found", `unknown operation: ${operationId}`);
    }
    return await slot.done;
  }

  list(): SlotSnapshot[] {
    return [...this.slots.values()].map(snapshot);
  }

  subscribe(listener: OperationEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    const open = [...this.slots.values()].filter((slot) => slot.state !== "finished");
    for (const slot of open) {
      this.cancel(slot.operationId);
    }
    await Promise.all(open.map((slot) => slot.done));
  }

  private processQueue(): void {
    if (this.activeExclusive) {
      return;
    }
    const next = this.pending.shift();
    if (!next) {
      return;
    }
    this.activeExclusive = next;
    this.start(next);
  }

  private start(slot: Slot): void {
    void this.runSlot(slot);
  }

  private async runSlot(slot: Slot): Promise<void> {
    const { operationId, descriptor } = slot;
    const signal = slot.controller.signal;
    slot.startedAt = new Date().toISOString();
    let result: OperationResult | undefined;
    try {
      this.transition(slot, "authorizing");
      let authorization: AuthorizationHandle;
      try {
        authorization = await this.broker.authorize(descriptor, { signal });
      } catch (error) {
        result = authorizationFailure(operationId, error, signal.aborted);
        return;
      }
      if (signal.aborted) {
        result = buildResult(operationId, "cancelled", null, "cancelled", "cancelled during authorization");
        return;
      }

      this.transition(slot, "running");
      for await (const update of this.executor.execute(operationId, descriptor, authorization, { signal })) {
        if (update.type === "progress") {
          this.emit({ type: "operation_progress", operationId, progress: update.progress });
          continue;
        }
        result = update.result;
      }
      if (!result) {
        result = buildResult(operationId, "failed", null, "execution_failed", "executor produced no result");
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error({ operationId, err: error }, "operation failed unexpectedly");
      result = buildResult(
        operationId,
        signal.aborted ? "cancelled" : "failed",
        null,
        signal.aborted ? "cancelled" : "execution_failed",
        detail
      );
    } finally {
      this.retire(
        slot,
        result ?? buildResult(operationId, "failed", null, "execution_failed", "operation ended without a result")
      );
      if (this.activeExclusive === slot) {
        this.activeExclusive = undefined;
        this.processQueue();
      }
    }
  }

  private retire(slot: Slot, result: OperationResult): void {
    if (slot.result) {
      return;
    }
    slot.result = result;
    slot.state = "finished";
    this.logger.info(
      {
        operationId: slot.operationId,
        kind: slot.descriptor.kind,
        source: slot.descriptor.source,
        status: result.status,
        errorKind: result.errorKind
      },
      "operation finished"
    );
    this.emit({ type: "operation_state", operationId: slot.operationId, state: "finished" });
    this.emit({ type: "operation_result", operationId: slot.operationId, result });
    slot.resolve(result);
    this.finishedOrder.push(slot.operationId);
    this.pruneFinished();
  }

  private pruneFinished(): void {
    while (this.finishedOrder.length > this.retainedResults) {
      const oldest = this.finishedOrder.shift();
      if (oldest) {
        this.slots.delete(oldest);
      }
    }
  }

  private transition(slot: Slot, state: SlotState, message?: string): void {
    if (slot.state === state) {
      return;
    }
    // a cancel request that raced ahead keeps the slot in cancelling
    if (slot.state === "cancelling" && state !== "finished") {
      return;
    }
    if (!canTransitionSlotState(slot.state, state)) {
      throw new Error(`invalid slot transition: ${slot.state} -> ${state}`);
    }
    slot.state = state;
    this.emit({ type: "operation_state", operationId: slot.operationId, state, message });
  }

  private emit(event: OperationEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error, type: event.type }, "operation listener threw");
      }
    }
  }
}

function authorizationFailure(operationId: string, error: unknown, aborted: boolean): OperationResult {
  if (error instanceof PrivilegeError) {
    if (error.code === "cancelled" || aborted) {
      return buildResult(operationId, "cancelled", null, "cancelled", error.message);
    }
    return buildResult(operationId, "failed", null, error.code, error.message);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return buildResult(
    operationId,
    aborted ? "cancelled" : "failed",
    null,
    aborted ? "cancelled" : "execution_failed",
    detail
  );
}

function snapshot(slot: Slot): SlotSnapshot {
  return {
    operationId: slot.operationId,
    descriptor: slot.descriptor,
    state: slot.state,
    exclusive: slot.exclusive,
    enqueuedAt: slot.enqueuedAt,
    ...(slot.startedAt ? { startedAt: slot.startedAt } : {}),
    ...(slot.result ? { result: slot.result } : {})
  };
}
