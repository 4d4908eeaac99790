import { z } from "zod";

const Base64Schema = z
  .string()
  .min(4)
  .regex(/^[A-Za-z0-9+/]+={0,2}$/)
  .refine((value) => value.length % 4 === 0, { message: "Invalid base64 length" });

export const ConnectionStateSchema = z.enum(["connecting", "connected", "disconnected"]);
export const PairingStateSchema = z.enum(["none", "pending", "paired"]);
export const ProviderTypeSchema = z.enum(["precise", "signalStrength"]);
export const DistanceLevelSchema = z.enum(["immediate", "near", "medium", "far", "veryFar", "unknown"]);
export const TokenExchangeStateSchema = z.enum(["idle", "waiting", "received", "completed"]);
export const AppStateSchema = z.enum(["idle", "discovering", "connected", "transmitting", "error"]);

export const PEER_MESSAGE_TYPES = [
  "handshake",
  "heartbeat",
  "volume-sync",
  "disconnect",
  "discovery-token",
  "token-ack",
  "pairing-request",
  "pairing-accept",
  "pairing-reject",
  "device-info",
  "audio-stream",
] as const;

export const PeerMessageTypeSchema = z.enum(PEER_MESSAGE_TYPES);

// `type` stays an open string here so that unknown tags survive decoding and
// can be mapped to the ignored variant instead of failing validation.
export const ProtocolFrameSchema = z.object({
  type: z.string().min(1),
  timestamp: z.number().nonnegative(),
  payload: z.record(z.string()).default({}),
});

export const PairingRequestPayloadSchema = z.object({
  deviceName: z.string().min(1),
});

export const DeviceInfoPayloadSchema = z.object({
  displayName: z.string().min(1),
  compatible: z.enum(["true", "false"]).default("true"),
});

export const DiscoveryTokenPayloadSchema = z.object({
  token: Base64Schema,
  sender: z.string().min(1).optional(),
});

export const DisconnectPayloadSchema = z.object({
  reason: z.string().optional(),
});

const numericString = z.string().trim().min(1).pipe(z.coerce.number().finite());

export const VolumeSyncPayloadSchema = z.object({
  volume: numericString.pipe(z.number().min(0).max(1)),
  distance: numericString.pipe(z.number().nonnegative()),
});

export const PairedDeviceSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  pairedAt: z.number().int().nonnegative(),
  lastConnected: z.number().int().nonnegative().optional(),
});

export const PairedDeviceListSchema = z.array(PairedDeviceSchema);

export const PeerSnapshotSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  connectionState: ConnectionStateSchema,
  pairingState: PairingStateSchema,
  providerType: ProviderTypeSchema,
  distance: z.number().nonnegative(),
  distanceLevel: DistanceLevelSchema,
  volume: z.number().min(0).max(1),
  rssi: z.number().int().optional(),
  remoteVolume: z.number().min(0).max(1).optional(),
  remoteDistance: z.number().nonnegative().optional(),
  lastSeen: z.number().int().nonnegative(),
  isCompatiblePeer: z.boolean(),
  selected: z.boolean(),
  tokenExchange: TokenExchangeStateSchema,
});

export const InboundPairingRequestSchema = z.object({
  peerId: z.string(),
  deviceName: z.string(),
  receivedAt: z.number().int().nonnegative(),
});

export const EngineSnapshotSchema = z.object({
  state: AppStateSchema,
  errorMessage: z.string().optional(),
  activeProvider: ProviderTypeSchema.optional(),
  discoverable: z.array(PeerSnapshotSchema),
  active: z.array(PeerSnapshotSchema),
  inboundRequest: InboundPairingRequestSchema.optional(),
});

export const EngineEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("state.changed"),
    from: AppStateSchema,
    to: AppStateSchema,
    errorMessage: z.string().optional(),
  }),
  z.object({ type: z.literal("peer.updated"), peer: PeerSnapshotSchema }),
  z.object({ type: z.literal("peer.removed"), peerId: z.string() }),
  z.object({ type: z.literal("pairing.request"), request: InboundPairingRequestSchema }),
  z.object({ type: z.literal("pairing.completed"), device: PairedDeviceSchema }),
  z.object({ type: z.literal("pairing.rejected"), peerId: z.string() }),
  z.object({ type: z.literal("pairing.timeout"), peerId: z.string() }),
  z.object({ type: z.literal("pairing.unpaired"), peerId: z.string() }),
  z.object({ type: z.literal("token.completed"), peerId: z.string() }),
  z.object({ type: z.literal("token.timeout"), peerId: z.string() }),
  z.object({ type: z.literal("ranging.notice"), provider: ProviderTypeSchema, message: z.string() }),
  z.object({ type: z.literal("error.banner"), subsystem: z.string(), message: z.string() }),
]);

// Host bridge: frames exchanged with the native radio host.

export const BridgeHelloSchema = z.object({
  type: z.literal("bridge.hello"),
  precise: z.boolean(),
  signalStrength: z.boolean(),
});

export const BridgePeerFoundSchema = z.object({
  type: z.literal("peer.found"),
  peerId: z.string().min(1),
  displayName: z.string().min(1),
  rssi: z.number().int().optional(),
  compatible: z.boolean().optional(),
});

export const BridgePeerLostSchema = z.object({
  type: z.literal("peer.lost"),
  peerId: z.string().min(1),
});

export const BridgePeerConnectionSchema = z.object({
  type: z.literal("peer.connection"),
  peerId: z.string().min(1),
  state: ConnectionStateSchema,
  displayName: z.string().min(1).optional(),
});

export const BridgePeerDataSchema = z.object({
  type: z.literal("peer.data"),
  peerId: z.string().min(1),
  data: Base64Schema,
});

export const BridgeRangingSampleSchema = z.object({
  type: z.literal("ranging.sample"),
  source: ProviderTypeSchema,
  peerId: z.string().min(1),
  value: z.number().finite(),
});

export const BridgeRangingStartedSchema = z.object({
  type: z.literal("ranging.started"),
  kind: ProviderTypeSchema,
});

export const BridgeRangingFailedSchema = z.object({
  type: z.literal("ranging.failed"),
  kind: ProviderTypeSchema,
  reason: z.string(),
});

export const BridgeRangingTokenSchema = z.object({
  type: z.literal("ranging.token"),
  token: Base64Schema,
});

export const BridgeRangingInvalidatedSchema = z.object({
  type: z.literal("ranging.invalidated"),
  peerId: z.string().min(1).optional(),
  reason: z.string(),
});

export const BridgeInboundSchema = z.discriminatedUnion("type", [
  BridgeHelloSchema,
  BridgePeerFoundSchema,
  BridgePeerLostSchema,
  BridgePeerConnectionSchema,
  BridgePeerDataSchema,
  BridgeRangingSampleSchema,
  BridgeRangingStartedSchema,
  BridgeRangingFailedSchema,
  BridgeRangingTokenSchema,
  BridgeRangingInvalidatedSchema,
]);

export const BridgeErrorMessageSchema = z.object({
  type: z.literal("bridge.error"),
  code: z.string(),
  message: z.string(),
  recoverable: z.boolean(),
});

export const BridgeOutboundSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("transport.discovery"), enabled: z.boolean() }),
  z.object({ type: z.literal("transport.send"), peerId: z.string().optional(), data: Base64Schema }),
  z.object({ type: z.literal("ranging.start"), kind: ProviderTypeSchema }),
  z.object({ type: z.literal("ranging.stop"), kind: ProviderTypeSchema }),
  z.object({ type: z.literal("ranging.configure"), peerId: z.string(), token: Base64Schema }),
  BridgeErrorMessageSchema,
]);

// Event socket: UI-facing stream of engine events.

export const SessionRequestSchema = z.object({
  clientId: z.string().min(1),
  role: z.enum(["ui", "bridge"]).default("ui"),
});

export const SessionResponseSchema = z.object({
  clientId: z.string(),
  role: z.enum(["ui", "bridge"]),
  socketUrl: z.string().url(),
  socketToken: z.string().min(1),
  tokenExpiresAtMs: z.number().int().nonnegative(),
});

export const EventSocketInboundSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("events.snapshot.request") }),
]);

export const EventSocketOutboundSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("events.snapshot"), snapshot: EngineSnapshotSchema, timestampMs: z.number().int() }),
  z.object({ type: z.literal("events.engine"), event: EngineEventSchema, timestampMs: z.number().int() }),
  z.object({
    type: z.literal("events.error"),
    code: z.string(),
    message: z.string(),
    recoverable: z.boolean(),
  }),
]);

export const PairingDecisionSchema = z.object({
  peerId: z.string().min(1),
});

export type ConnectionState = z.infer<typeof ConnectionStateSchema>;
export type PairingState = z.infer<typeof PairingStateSchema>;
export type ProviderType = z.infer<typeof ProviderTypeSchema>;
export type DistanceLevel = z.infer<typeof DistanceLevelSchema>;
export type TokenExchangeState = z.infer<typeof TokenExchangeStateSchema>;
export type AppState = z.infer<typeof AppStateSchema>;
export type PeerMessageType = z.infer<typeof PeerMessageTypeSchema>;
export type ProtocolFrame = z.infer<typeof ProtocolFrameSchema>;
export type PairedDevice = z.infer<typeof PairedDeviceSchema>;
export type VolumeSyncPayload = z.infer<typeof VolumeSyncPayloadSchema>;
export type PeerSnapshot = z.infer<typeof PeerSnapshotSchema>;
export type InboundPairingRequest = z.infer<typeof InboundPairingRequestSchema>;
export type EngineSnapshot = z.infer<typeof EngineSnapshotSchema>;
export type EngineEvent = z.infer<typeof EngineEventSchema>;
export type BridgeInbound = z.infer<typeof BridgeInboundSchema>;
export type BridgeOutbound = z.infer<typeof BridgeOutboundSchema>;
export type SessionRequest = z.infer<typeof SessionRequestSchema>;
export type SessionResponse = z.infer<typeof SessionResponseSchema>;
export type EventSocketInbound = z.infer<typeof EventSocketInboundSchema>;
export type EventSocketOutbound = z.infer<typeof EventSocketOutboundSchema>;
