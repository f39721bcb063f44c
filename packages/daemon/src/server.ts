import type { IncomingHttpHeaders } from "node:http";
import type { FastifyReply, FastifyServerOptions } from "fastify";
import Fastify from "fastify";
import { WebSocketServer } from "ws";
import {
  createOperationDescriptor,
  describeOperation,
  DescriptorError,
  isRecord,
  parseClientEnvelope,
  parseOperationKind,
  toDescriptorInput,
  type DaemonEnvelope,
  type OperationDescriptor,
  type OperationDescriptorInput,
  type OperationEvent,
  type SlotState
} from "@softcenter/shared";
import {
  createSoftwareCenterCore,
  loadOperationConfigFromEnv,
  QueueError,
  TOOL_NAMES,
  type SoftwareCenterCore
} from "@softcenter/ops-core";
import { AuditStore } from "./audit-store.js";
import { ClientRegistry } from "./client-registry.js";
import { loadDaemonConfigFromEnv, type DaemonConfig } from "./config.js";
import { createDaemonStoresFromEnv } from "./store-factory.js";
import type { DaemonStores, OperationAuditEvent } from "./store-types.js";

export { loadDaemonConfigFromEnv, type DaemonConfig } from "./config.js";
export { createDaemonStoresFromEnv } from "./store-factory.js";
export type { DaemonStores } from "./store-types.js";

export type DaemonServerDeps = {
  core?: SoftwareCenterCore;
  stores?: DaemonStores;
  config?: Partial<DaemonConfig>;
  version?: string;
};

export type SubmitOutcome =
  | { ok: true; operationId: string; duplicate: boolean }
  | { ok: false; error: "invalid_descriptor" | "forbidden_kind" | "queue_closed"; detail: string };

type SubmitRequest = {
  requestId?: string;
  // remediation and maintenance descriptors come from the diagnostics engine, never a client
  trusted?: boolean;
};

const EVENTS_PATH = "/events";

export async function createDaemonServer(
  options: FastifyServerOptions = {},
  deps: DaemonServerDeps = {}
) {
  const app = Fastify({ logger: true, ...options });
  const config: DaemonConfig = { ...loadDaemonConfigFromEnv(), ...deps.config };
  const version = deps.version ?? "0.1.0";
  const core = deps.core ?? createSoftwareCenterCore(loadOperationConfigFromEnv());
  const stores = deps.stores ?? (await createDaemonStoresFromEnv());
  const auditStore = new AuditStore(
    stores.auditIndex,
    config.auditLogPath?.trim() || undefined,
    config.auditMaxRecords
  );
  try {
    const restored = await auditStore.hydrateFromDisk();
    if (restored > 0) {
      app.log.info({ restored }, "audit events restored");
    }
  } catch (error) {
    app.log.error({ err: error }, "failed to hydrate audit store");
  }

  const clients = new ClientRegistry();
  const wss = new WebSocketServer({ noServer: true });

  const unsubscribe = core.queue.subscribe((event) => {
    clients.broadcast({ type: "operation.event", event });
    const auditEvent = toAuditEvent(event);
    if (auditEvent) {
      auditStore.record(auditEvent).catch((error: unknown) => {
        app.log.error({ err: error, operationId: event.operationId }, "failed to record audit event");
      });
    }
  });

  let submissionChain: Promise<unknown> = Promise.resolve();

  // Submissions run one at a time so a repeated requestId cannot race its own lookup.
  function submitOperation(input: OperationDescriptorInput, request: SubmitRequest = {}): Promise<SubmitOutcome> {
    const next = submissionChain.then(() => submitNow(input, request));
    submissionChain = next.catch(() => undefined);
    return next;
  }

  async function submitNow(input: OperationDescriptorInput, request: SubmitRequest): Promise<SubmitOutcome> {
    const { requestId } = request;
    if (!request.trusted && parseOperationKind(input.kind) === "diagnostic_fix") {
      return {
        ok: false,
        error: "forbidden_kind",
        detail: "diagnostic_fix runs only through /diagnostics/:checkId/fix or /maintenance/:actionId"
      };
    }
    let descriptor: OperationDescriptor;
    try {
      descriptor = createOperationDescriptor(input);
    } catch (error) {
      if (error instanceof DescriptorError) {
        return { ok: false, error: "invalid_descriptor", detail: `${error.code}: ${error.message}` };
      }
      throw error;
    }
    if (requestId) {
      const existing = await stores.submissionKeys.lookup(requestId);
      if (existing) {
        return { ok: true, operationId: existing, duplicate: true };
      }
    }
    let operationId: string;
    try {
      operationId = core.queue.submit(descriptor);
    } catch (error) {
      if (error instanceof QueueError && error.code === "closed") {
        return { ok: false, error: "queue_closed", detail: error.message };
      }
      throw error;
    }
    if (requestId) {
      await stores.submissionKeys.remember(requestId, operationId, config.submissionTtlMs);
    }
    return { ok: true, operationId, duplicate: false };
  }

  async function sendSubmitOutcome(reply: FastifyReply, outcome: SubmitOutcome) {
    if (!outcome.ok) {
      const status = outcome.error === "queue_closed" ? 503 : outcome.error === "forbidden_kind" ? 403 : 400;
      return reply.status(status).send({ error: outcome.error, detail: outcome.detail });
    }
    return reply.status(202).send({ operationId: outcome.operationId, duplicate: outcome.duplicate });
  }

  app.addHook("onClose", async () => {
    unsubscribe();
    await core.queue.close();
    await auditStore.flush();
    clients.closeAll();
    wss.close();
    await stores.close();
  });

  app.server.on("upgrade", (request, socket, head) => {
    const pathname = (request.url ?? "").split("?")[0];
    if (pathname !== EVENTS_PATH) {
      socket.destroy();
      return;
    }
    if (!isAllowedOrigin(readHeader(request.headers, "origin"), readHeader(request.headers, "host"), config.allowedOrigins)) {
      app.log.warn({ origin: readHeader(request.headers, "origin") }, "rejected cross-origin event stream");
      socket.write("HTTP/1.1 403 Forbidden\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    if (config.adminToken && readHeader(request.headers, "x-admin-token") !== config.adminToken) {
      socket.write("HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  wss.on("connection", (socket) => {
    const sessionId = clients.register(socket);
    clients.send(sessionId, {
      type: "daemon.hello",
      version,
      connectedAt: new Date().toISOString()
    });

    socket.on("message", (data) => {
      void (async () => {
        const envelope = parseClientEnvelope(data.toString());
        if (!envelope) {
          clients.send(sessionId, {
            type: "operation.rejected",
            error: "invalid_message",
            detail: "expected operation.submit or operation.cancel"
          });
          return;
        }
        if (envelope.type === "operation.cancel") {
          clients.send(sessionId, cancelOverSocket(core, envelope.operationId));
          return;
        }
        const outcome = await submitOperation(envelope.descriptor, { requestId: envelope.requestId });
        clients.send(
          sessionId,
          outcome.ok
            ? {
              type: "operation.accepted",
              requestId: envelope.requestId,
              operationId: outcome.operationId,
              duplicate: outcome.duplicate
            }
            : {
              type: "operation.rejected",
              requestId: envelope.requestId,
              error: outcome.error,
              detail: outcome.detail
            }
        );
      })().catch((error: unknown) => {
        app.log.error({ err: error, sessionId }, "failed to handle client message");
        clients.send(sessionId, {
          type: "operation.rejected",
          error: "internal_error",
          detail: error instanceof Error ? error.message : String(error)
        });
      });
    });

    socket.on("close", () => {
      clients.remove(sessionId);
    });
  });

  app.get("/healthz", async () => ({ status: "ok", version }));

  app.get("/metrics", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const byState: Partial<Record<SlotState, number>> = {};
    for (const slot of core.queue.list()) {
      byState[slot.state] = (byState[slot.state] ?? 0) + 1;
    }
    return reply.status(200).send({
      operations: { byState },
      clients: { connected: clients.list().length },
      audit: {
        records: await auditStore.count(),
        byStatus: await auditStore.statusCounts()
      },
      store: {
        mode: stores.diagnostics.mode,
        degraded: stores.diagnostics.degraded,
        redisErrorCount: stores.diagnostics.redisErrorCount
      }
    });
  });

  app.get("/ops/config", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    return reply.status(200).send({
      daemon: {
        version,
        adminTokenEnabled: Boolean(config.adminToken),
        submissionTtlMs: config.submissionTtlMs
      },
      operations: core.config,
      audit: {
        logPath: config.auditLogPath ?? null,
        maxRecords: config.auditMaxRecords
      },
      store: stores.diagnostics
    });
  });

  app.get<{ Querystring: { refresh?: string } }>("/tools", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    if (request.query.refresh === "1" || request.query.refresh === "true") {
      core.prober.refresh();
    }
    const availability = await core.prober.probeAll(TOOL_NAMES);
    const items = TOOL_NAMES.flatMap((tool) => {
      const entry = availability[tool];
      return entry ? [entry] : [];
    });
    return reply.status(200).send({ items });
  });

  app.post("/operations", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const body = isRecord(request.body) ? request.body : {};
    const input = toDescriptorInput(body.descriptor);
    if (!input) {
      return reply.status(400).send({
        error: "invalid_descriptor",
        detail: "descriptor with kind and source is required"
      });
    }
    const requestId = typeof body.requestId === "string" && body.requestId.trim()
      ? body.requestId.trim()
      : undefined;
    return sendSubmitOutcome(reply, await submitOperation(input, { requestId }));
  });

  app.get("/operations", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    return reply.status(200).send({ items: core.queue.list() });
  });

  app.get<{ Params: { operationId: string } }>("/operations/:operationId", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const { operationId } = request.params;
    const slot = core.queue.status(operationId);
    const audit = await auditStore.get(operationId);
    if (!slot && !audit) {
      return reply.status(404).send({ error: "operation_not_found" });
    }
    return reply.status(200).send({ operationId, slot: slot ?? null, audit: audit ?? null });
  });

  app.post<{ Params: { operationId: string } }>(
    "/operations/:operationId/cancel",
    async (request, reply) => {
      if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
        return;
      }
      const { operationId } = request.params;
      try {
        core.queue.cancel(operationId);
      } catch (error) {
        if (error instanceof QueueError && error.code === "not_found") {
          return reply.status(404).send({ error: "operation_not_found" });
        }
        if (error instanceof QueueError && error.code === "not_cancellable") {
          return reply.status(409).send({ error: "operation_not_cancellable" });
        }
        throw error;
      }
      return reply.status(202).send({ status: "cancel_requested", operationId });
    }
  );

  app.get("/diagnostics", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    return reply.status(200).send({ items: await core.diagnostics.runChecks() });
  });

  app.get<{ Querystring: { packages?: string } }>("/diagnostics/preinstall", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const packages = parsePackageList(request.query.packages);
    if (packages.length === 0) {
      return reply.status(400).send({ error: "missing_packages" });
    }
    return reply.status(200).send({ items: await core.diagnostics.preInstallChecks(packages) });
  });

  app.get<{ Querystring: { packages?: string } }>("/diagnostics/installed", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const packages = parsePackageList(request.query.packages);
    if (packages.length === 0) {
      return reply.status(400).send({ error: "missing_packages" });
    }
    return reply.status(200).send({ items: await core.diagnostics.verifyInstalled(packages) });
  });

  app.post<{ Params: { checkId: string } }>("/diagnostics/:checkId/fix", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const descriptor = core.diagnostics.remediationFor(request.params.checkId);
    if (!descriptor) {
      return reply.status(404).send({ error: "remediation_not_found" });
    }
    return sendSubmitOutcome(reply, await submitOperation(descriptor, { trusted: true }));
  });

  app.get("/maintenance", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    return reply.status(200).send({ items: core.diagnostics.maintenanceActions() });
  });

  app.post<{ Params: { actionId: string } }>("/maintenance/:actionId", async (request, reply) => {
    if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
      return;
    }
    const descriptor = core.diagnostics.maintenanceAction(request.params.actionId);
    if (!descriptor) {
      return reply.status(404).send({ error: "maintenance_action_not_found" });
    }
    return sendSubmitOutcome(reply, await submitOperation(descriptor, { trusted: true }));
  });

  app.get<{ Querystring: { limit?: string; status?: string; kind?: string; source?: string } }>(
    "/audit/recent",
    async (request, reply) => {
      if (!assertAdminAuthorized(request.headers, reply, config.adminToken)) {
        return;
      }
      const parsedLimit = Number(request.query.limit ?? "50");
      const limit = Number.isFinite(parsedLimit) ? parsedLimit : 50;
      return reply.status(200).send({
        items: await auditStore.listRecent(limit, {
          status: request.query.status,
          kind: request.query.kind,
          source: request.query.source
        })
      });
    }
  );

  return app;
}

export function toAuditEvent(event: OperationEvent): OperationAuditEvent | undefined {
  const timestamp = new Date().toISOString();
  switch (event.type) {
    case "operation_queued":
      return {
        operationId: event.operationId,
        timestamp,
        status: "queued",
        kind: event.descriptor.kind,
        source: event.descriptor.source,
        target: event.descriptor.target,
        summary: describeOperation(event.descriptor)
      };
    case "operation_state":
      // queued is covered by operation_queued and finished by operation_result
      if (event.state === "queued" || event.state === "finished") {
        return undefined;
      }
      return {
        operationId: event.operationId,
        timestamp,
        status: event.state,
        ...(event.message ? { summary: event.message } : {})
      };
    case "operation_result":
      return {
        operationId: event.operationId,
        timestamp: event.result.finishedAt,
        status: event.result.status,
        ...(event.result.errorKind ? { errorKind: event.result.errorKind } : {}),
        ...(event.result.errorDetail ? { summary: event.result.errorDetail } : {})
      };
    case "operation_progress":
      return undefined;
  }
}

function cancelOverSocket(core: SoftwareCenterCore, operationId: string): DaemonEnvelope {
  try {
    core.queue.cancel(operationId);
  } catch (error) {
    if (error instanceof QueueError) {
      return {
        type: "operation.rejected",
        operationId,
        error: error.code === "not_found" ? "operation_not_found" : "operation_not_cancellable",
        detail: error.message
      };
    }
    throw error;
  }
  return { type: "operation.accepted", operationId, duplicate: false };
}

export function parsePackageList(raw?: string): string[] {
  return (raw ?? "")
    .split(/[,\s]+/)
    .map((value) => value.trim())
    .filter(Boolean);
}

function readHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

// Clients without an Origin header are local programs; browsers always send one.
export function isAllowedOrigin(
  origin: string | undefined,
  host: string | undefined,
  allowedOrigins: readonly string[] = []
): boolean {
  if (origin === undefined) {
    return true;
  }
  if (allowedOrigins.includes(origin)) {
    return true;
  }
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch {
    return false;
  }
  return host !== undefined && parsed.host === host;
}

function assertAdminAuthorized(
  headers: IncomingHttpHeaders,
  reply: FastifyReply,
  adminToken?: string
): boolean {
  if (!adminToken) {
    return true;
  }
  if (readHeader(headers, "x-admin-token") !== adminToken) {
    void reply.status(401).send({ error: "unauthorized_admin_request" });
    return false;
  }
  return true;
}
