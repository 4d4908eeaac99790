import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import websocket from "@fastify/websocket";
import {
  BridgeInboundSchema,
  EventSocketInboundSchema,
  PairingDecisionSchema,
  SessionRequestSchema,
  type BridgeOutbound,
  type EventSocketOutbound,
  type SessionResponse,
} from "@nearlink/contracts";
import {
  IllegalStateError,
  NoRangingSourceError,
  PeerSendError,
  ProximityEngine,
  UnknownPeerError,
  type PairedDeviceStore,
} from "@nearlink/engine";
import {
  assertControlAuth,
  AuthError,
  issueSocketToken,
  socketTokenFromUrl,
  verifySocketToken,
  type SocketRole,
} from "./auth.js";
import { BridgeUnavailableError, HostBridge } from "./bridge.js";
import type { AppConfig } from "./config.js";
import { EventFanout, type EventClient } from "./events.js";
import { JsonFilePairedDeviceStore } from "./file-store.js";
import { decodeFrame } from "./frames.js";
import { FixedWindowRateLimiter } from "./rate-limit.js";

export interface ServerDeps {
  hub?: HostBridge;
  store?: PairedDeviceStore;
}

interface PeerParams {
  peerId: string;
}

const SESSION_WINDOW_MS = 60_000;

function socketUrlFromRequest(
  request: { headers: Record<string, unknown>; protocol: string },
  role: SocketRole,
): string {
  const forwardedProto = typeof request.headers["x-forwarded-proto"] === "string"
    ? request.headers["x-forwarded-proto"]
    : undefined;
  const forwardedHost = typeof request.headers["x-forwarded-host"] === "string"
    ? request.headers["x-forwarded-host"]
    : undefined;
  const host = typeof request.headers.host === "string" ? request.headers.host : "127.0.0.1:8080";

  const proto = (forwardedProto ?? request.protocol) === "https" ? "wss" : "ws";
  return `${proto}://${forwardedHost ?? host}/${role === "bridge" ? "bridge" : "events"}`;
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 256_000,
    logger: {
      transport: process.env.NODE_ENV === "production" ? undefined : { target: "pino-pretty" },
    },
  });

  await app.register(websocket);

  const hub = deps.hub ?? new HostBridge(app.log.child({ module: "bridge" }), config.bridgeStartTimeoutMs);
  const store = deps.store ?? new JsonFilePairedDeviceStore(config.pairedDevicesPath, app.log.child({ module: "store" }));
  const engine = new ProximityEngine(
    {
      transport: hub.transport,
      ranging: { precise: hub.precise, signalStrength: hub.signalStrength },
      store,
      logger: app.log.child({ module: "engine" }),
    },
    {
      localName: config.deviceName,
      estimator: {
        measuredPowerDbm: config.measuredPowerDbm,
        pathLossExponent: config.pathLossExponent,
        smoothingWindow: config.smoothingWindow,
        smoothingPolicy: config.smoothingPolicy,
        tierProfile: config.tierProfile,
        distanceClamp: config.distanceClamp,
        volume: {
          minDistanceM: config.minDistanceM,
          maxDistanceM: config.maxDistanceM,
          minVolume: config.minVolume,
          maxVolume: config.maxVolume,
        },
      },
      staleTimeoutMs: config.staleTimeoutSec * 1000,
      staleSweepMs: config.staleSweepSec * 1000,
      pairingTimeoutMs: config.pairingTimeoutSec * 1000,
      tokenExchangeTimeoutMs: config.tokenExchangeTimeoutSec * 1000,
      heartbeatIntervalMs: config.heartbeatIntervalSec * 1000,
    },
  );
  await engine.init();

  const fanout = new EventFanout(engine);
  const rateLimiter = new FixedWindowRateLimiter({
    maxPerWindow: config.sessionsPerMinutePerIp,
    windowMs: SESSION_WINDOW_MS,
  });
  const pruneInterval = setInterval(() => {
    rateLimiter.prune();
  }, SESSION_WINDOW_MS);

  app.addHook("onClose", async () => {
    clearInterval(pruneInterval);
    fanout.close();
    await engine.stop();
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AuthError) {
      return reply.code(401).send({ error: "unauthorized" });
    }
    if (error instanceof UnknownPeerError) {
      return reply.code(404).send({ error: "unknown_peer", peerId: error.peerId });
    }
    if (error instanceof IllegalStateError) {
      return reply.code(409).send({ error: "illegal_state", message: error.message });
    }
    if (error instanceof PeerSendError) {
      request.log.warn({ err: error }, "peer send failed");
      return reply.code(502).send({ error: "send_failed", peerId: error.peerId });
    }
    if (error instanceof NoRangingSourceError) {
      return reply.code(503).send({ error: "ranging_unavailable", message: error.message });
    }
    if (error instanceof BridgeUnavailableError) {
      return reply.code(503).send({ error: "bridge_unavailable", message: error.message });
    }
    request.log.error({ err: error }, "unhandled request error");
    return reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  async function requireControlAuth(request: FastifyRequest): Promise<void> {
    assertControlAuth(request.headers.authorization, config.controlAuthToken);
  }

  function illegalState(reply: FastifyReply, message: string): FastifyReply {
    return reply.code(409).send({ error: "illegal_state", message });
  }

  const guarded = { preHandler: requireControlAuth };

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    state: engine.appState,
    bridgeAttached: hub.attached,
    pairedDevices: engine.pairedDevices().length,
  }));

  app.post("/sessions", async (request, reply) => {
    const limitKey = `sessions:${request.ip}`;
    if (!rateLimiter.allow(limitKey)) {
      const retryAfterSec = rateLimiter.retryAfterSec(limitKey);
      return reply.code(429).header("retry-after", String(retryAfterSec)).send({ error: "rate_limited", retryAfterSec });
    }

    assertControlAuth(request.headers.authorization, config.controlAuthToken);

    const parsed = SessionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const { clientId, role } = parsed.data;
    const issued = issueSocketToken({ clientId, role }, config.sessionSecret, config.sessionTokenTtlSec);
    const response: SessionResponse = {
      clientId,
      role,
      socketUrl: socketUrlFromRequest(request, role),
      socketToken: issued.token,
      tokenExpiresAtMs: issued.expiresAtMs,
    };
    return reply.send(response);
  });

  // Reads wait for queued bridge input to be applied first.
  app.get("/state", guarded, async () => {
    await engine.idle();
    return engine.snapshot();
  });

  app.get("/paired-devices", guarded, async () => {
    await engine.idle();
    return { devices: engine.pairedDevices() };
  });

  app.post("/discovery/start", guarded, async () => {
    await engine.start();
    return engine.snapshot();
  });

  app.post("/discovery/stop", guarded, async () => {
    await engine.stop();
    return engine.snapshot();
  });

  app.post<{ Params: PeerParams }>("/peers/:peerId/select", guarded, async (request) => {
    const selected = await engine.select(request.params.peerId);
    return { selected: selected ?? null };
  });

  app.post<{ Params: PeerParams }>("/peers/:peerId/pairing", guarded, async (request, reply) => {
    if (!(await engine.requestPairing(request.params.peerId))) {
      return illegalState(reply, "Peer is already pending or paired");
    }
    return reply.code(202).send({ ok: true, peerId: request.params.peerId });
  });

  app.delete<{ Params: PeerParams }>("/peers/:peerId/pairing", guarded, async (request, reply) => {
    if (!(await engine.unpair(request.params.peerId))) {
      return illegalState(reply, "Peer is not paired");
    }
    return reply.send({ ok: true, peerId: request.params.peerId });
  });

  app.post("/pairing/accept", guarded, async (request, reply) => {
    const parsed = PairingDecisionSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    if (!(await engine.acceptPairing(parsed.data.peerId))) {
      return illegalState(reply, "No pairing request from this peer is outstanding");
    }
    return reply.send({ ok: true, peerId: parsed.data.peerId });
  });

  app.post("/pairing/reject", guarded, async (request, reply) => {
    const parsed = PairingDecisionSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    if (!(await engine.rejectPairing(parsed.data.peerId))) {
      return illegalState(reply, "No pairing request from this peer is outstanding");
    }
    return reply.send({ ok: true, peerId: parsed.data.peerId });
  });

  app.post("/peers/purge", guarded, async () => ({ removed: await engine.purgeStale() }));

  app.get("/events", { websocket: true }, (socket, request) => {

    const send = (message: EventSocketOutbound): void => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    };

    let clientId: string;
    try {
      clientId = verifySocketToken(socketTokenFromUrl(request.url), config.sessionSecret, "ui").clientId;
    } catch (error) {
      request.log.info({ err: error }, "event socket refused");
      send({ type: "events.error", code: "auth_failed", message: "Invalid socket token", recoverable: true });
      socket.close(4401, "unauthorized");
      return;
    }

    const client: EventClient = { clientId, send };
    fanout.add(client);

    socket.on("message", (raw: unknown) => {
      const frame = decodeFrame(raw, EventSocketInboundSchema);
      if (!frame.ok) {
        send({ type: "events.error", code: frame.code, message: frame.message, recoverable: false });
        socket.close(4400, frame.code);
        return;
      }
      if (frame.value.type === "events.snapshot.request") {
        fanout.sendSnapshot(client);
      }
    });

    socket.on("close", () => {
      fanout.remove(client);
    });
  });

  app.get("/bridge", { websocket: true }, (socket, request) => {

    const outbound = (frame: BridgeOutbound): void => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(frame));
      }
    };

    try {
      const { clientId } = verifySocketToken(socketTokenFromUrl(request.url), config.sessionSecret, "bridge");
      request.log.info({ clientId }, "host bridge socket opened");
    } catch (error) {
      request.log.info({ err: error }, "bridge socket refused");
      outbound({ type: "bridge.error", code: "auth_failed", message: "Invalid socket token", recoverable: true });
      socket.close(4401, "unauthorized");
      return;
    }

    if (!hub.attach(outbound)) {
      outbound({ type: "bridge.error", code: "bridge_busy", message: "Another host is attached", recoverable: true });
      socket.close(4409, "bridge_busy");
      return;
    }

    socket.on("message", (raw: unknown) => {
      const frame = decodeFrame(raw, BridgeInboundSchema);
      if (!frame.ok) {
        outbound({ type: "bridge.error", code: frame.code, message: frame.message, recoverable: true });
        return;
      }
      hub.handleFrame(frame.value);
    });

    socket.on("close", () => {
      hub.detach(outbound);
      if (engine.appState === "idle" || engine.appState === "error") {
        return;
      }
      engine.reportSubsystemFailure("bridge", "Host bridge disconnected").catch((error: unknown) => {
        app.log.error({ err: error }, "failed to report bridge loss");
      });
    });
  });

  return app;
}
