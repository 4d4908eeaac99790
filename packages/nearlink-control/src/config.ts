import type { DistanceClamp, SmoothingPolicy, TierProfile } from "@nearlink/engine";

export interface AppConfig {
  port: number;
  host: string;
  controlAuthToken: string;
  sessionSecret: string;
  sessionTokenTtlSec: number;
  sessionsPerMinutePerIp: number;
  deviceName: string;
  pairedDevicesPath: string;
  measuredPowerDbm: number;
  pathLossExponent: number;
  smoothingWindow: number;
  smoothingPolicy: SmoothingPolicy;
  tierProfile: TierProfile;
  distanceClamp: DistanceClamp;
  minDistanceM: number;
  maxDistanceM: number;
  minVolume: number;
  maxVolume: number;
  staleTimeoutSec: number;
  staleSweepSec: number;
  pairingTimeoutSec: number;
  tokenExchangeTimeoutSec: number;
  heartbeatIntervalSec: number;
  bridgeStartTimeoutMs: number;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function choiceEnv<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`Invalid env var ${name}: ${value} (expected one of ${choices.join(", ")})`);
  }
  return match;
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: process.env.HOST ?? "0.0.0.0",
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    sessionSecret: required("SESSION_SECRET"),
    sessionTokenTtlSec: numberEnv("SESSION_TOKEN_TTL_SEC", 900),
    sessionsPerMinutePerIp: numberEnv("SESSIONS_PER_MINUTE_PER_IP", 60),
    deviceName: required("DEVICE_NAME"),
    pairedDevicesPath: process.env.PAIRED_DEVICES_PATH ?? "./paired-devices.json",
    measuredPowerDbm: numberEnv("MEASURED_POWER_DBM", -50),
    pathLossExponent: numberEnv("PATH_LOSS_EXPONENT", 2),
    smoothingWindow: numberEnv("SMOOTHING_WINDOW", 5),
    smoothingPolicy: choiceEnv("SMOOTHING_POLICY", ["sigma", "trimmed"], "sigma"),
    tierProfile: choiceEnv("TIER_PROFILE", ["compact", "extended"], "compact"),
    distanceClamp: choiceEnv("DISTANCE_CLAMP", ["standard", "wide"], "standard"),
    minDistanceM: numberEnv("MIN_DISTANCE_M", 1),
    maxDistanceM: numberEnv("MAX_DISTANCE_M", 10),
    minVolume: numberEnv("MIN_VOLUME", 0.1),
    maxVolume: numberEnv("MAX_VOLUME", 1),
    staleTimeoutSec: numberEnv("STALE_TIMEOUT_SEC", 30),
    staleSweepSec: numberEnv("STALE_SWEEP_SEC", 5),
    pairingTimeoutSec: numberEnv("PAIRING_TIMEOUT_SEC", 30),
    tokenExchangeTimeoutSec: numberEnv("TOKEN_EXCHANGE_TIMEOUT_SEC", 10),
    heartbeatIntervalSec: numberEnv("HEARTBEAT_INTERVAL_SEC", 10),
    bridgeStartTimeoutMs: numberEnv("BRIDGE_START_TIMEOUT_MS", 5000),
  };
}
