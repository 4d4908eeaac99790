import type { DistanceLevel } from "@nearlink/contracts";
import { ConfigurationError } from "./errors.js";

export type SmoothingPolicy = "sigma" | "trimmed";
export type TierProfile = "compact" | "extended";
export type DistanceClamp = "standard" | "wide";

export interface VolumeCurve {
  minDistanceM: number;
  maxDistanceM: number;
  minVolume: number;
  maxVolume: number;
}

export interface DistanceEstimatorOptions {
  /** Signal strength observed at 1 m, in dBm. */
  measuredPowerDbm: number;
  pathLossExponent: number;
  smoothingWindow: number;
  smoothingPolicy: SmoothingPolicy;
  tierProfile: TierProfile;
  distanceClamp: DistanceClamp;
  volume: VolumeCurve;
}

export const DEFAULT_VOLUME_CURVE: VolumeCurve = {
  minDistanceM: 1,
  maxDistanceM: 10,
  minVolume: 0.1,
  maxVolume: 1,
};

export const DEFAULT_ESTIMATOR_OPTIONS: DistanceEstimatorOptions = {
  measuredPowerDbm: -50,
  pathLossExponent: 2,
  smoothingWindow: 5,
  smoothingPolicy: "sigma",
  tierProfile: "compact",
  distanceClamp: "standard",
  volume: DEFAULT_VOLUME_CURVE,
};

const CLAMP_RANGES: Record<DistanceClamp, readonly [number, number]> = {
  standard: [0, 50],
  wide: [0.1, 100],
};

// Exclusive upper bounds of immediate, near, medium and far; anything at or
// beyond the last one is veryFar.
const TIER_LADDERS: Record<TierProfile, readonly [number, number, number, number]> = {
  compact: [1, 3, 6, 10],
  extended: [1, 3, 10, 20],
};

const MIN_SAMPLES_FOR_REJECTION = 3;
const SIGMA_EPSILON = 1e-9;

export function assertValidVolumeCurve(curve: VolumeCurve): void {
  const values = [curve.minDistanceM, curve.maxDistanceM, curve.minVolume, curve.maxVolume];
  if (values.some((value) => !Number.isFinite(value))) {
    throw new ConfigurationError("Volume curve bounds must be finite numbers");
  }
  if (curve.minVolume <= 0) {
    throw new ConfigurationError(`minVolume must be > 0, got ${curve.minVolume}`);
  }
  if (curve.maxVolume > 1 || curve.maxVolume < curve.minVolume) {
    throw new ConfigurationError(
      `maxVolume must lie in [minVolume, 1], got ${curve.maxVolume} with minVolume ${curve.minVolume}`,
    );
  }
  if (curve.maxDistanceM <= curve.minDistanceM) {
    throw new ConfigurationError(
      `maxDistanceM must exceed minDistanceM, got ${curve.maxDistanceM} <= ${curve.minDistanceM}`,
    );
  }
}

function assertValidOptions(options: DistanceEstimatorOptions): void {
  if (!Number.isFinite(options.measuredPowerDbm)) {
    throw new ConfigurationError("measuredPowerDbm must be a finite number");
  }
  if (!Number.isFinite(options.pathLossExponent) || options.pathLossExponent <= 0) {
    throw new ConfigurationError(`pathLossExponent must be > 0, got ${options.pathLossExponent}`);
  }
  if (!Number.isInteger(options.smoothingWindow) || options.smoothingWindow < 1) {
    throw new ConfigurationError(`smoothingWindow must be a positive integer, got ${options.smoothingWindow}`);
  }
  assertValidVolumeCurve(options.volume);
}

/**
 * Log-distance path loss model. Non-negative (or non-finite) readings are not
 * valid signal strengths and map to the sentinel distance 0.
 */
export function rssiToDistance(
  rssi: number,
  measuredPowerDbm = DEFAULT_ESTIMATOR_OPTIONS.measuredPowerDbm,
  pathLossExponent = DEFAULT_ESTIMATOR_OPTIONS.pathLossExponent,
  clamp: DistanceClamp = "standard",
): number {
  if (!Number.isFinite(rssi) || rssi >= 0) {
    return 0;
  }
  const [low, high] = CLAMP_RANGES[clamp];
  const distance = 10 ** ((measuredPowerDbm - rssi) / (10 * pathLossExponent));
  return Math.min(Math.max(distance, low), high);
}

export function distanceLevel(distance: number, profile: TierProfile = "compact"): DistanceLevel {
  if (!Number.isFinite(distance) || distance < 0) {
    return "unknown";
  }
  const [immediate, near, medium, far] = TIER_LADDERS[profile];
  if (distance < immediate) {
    return "immediate";
  }
  if (distance < near) {
    return "near";
  }
  if (distance < medium) {
    return "medium";
  }
  if (distance < far) {
    return "far";
  }
  return "veryFar";
}

/**
 * Exponential decay between the two distance bounds, so that equal steps in
 * distance give equal perceived loudness drops.
 */
export function volumeForDistance(distance: number, curve: Partial<VolumeCurve> = {}): number {
  const resolved: VolumeCurve = { ...DEFAULT_VOLUME_CURVE, ...curve };
  assertValidVolumeCurve(resolved);
  const { minDistanceM, maxDistanceM, minVolume, maxVolume } = resolved;

  if (Number.isNaN(distance) || distance >= maxDistanceM) {
    return minVolume;
  }
  if (distance <= minDistanceM) {
    return maxVolume;
  }
  const k = Math.log(maxVolume / minVolume) / (maxDistanceM - minDistanceM);
  const volume = maxVolume * Math.exp(-k * (distance - minDistanceM));
  return Math.min(Math.max(volume, minVolume), maxVolume);
}

function average(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function standardDeviation(values: readonly number[], mean: number): number {
  const variance = values.reduce((sum, value) => sum + ((value - mean) ** 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Smoothed value of a sample window. Below three samples this is the plain
 * mean. The sigma policy judges each sample against the mean and deviation of
 * the remaining samples and averages those within two deviations; the
 * trimmed policy drops the single lowest and highest sample.
 */
export function smoothSamples(samples: readonly number[], policy: SmoothingPolicy = "sigma"): number {
  if (samples.length === 0) {
    return 0;
  }
  if (samples.length < MIN_SAMPLES_FOR_REJECTION) {
    return average(samples);
  }

  switch (policy) {
    case "trimmed": {
      const sorted = [...samples].sort((a, b) => a - b);
      return average(sorted.slice(1, -1));
    }
    case "sigma": {
      const kept = samples.filter((sample, index) => {
        const others = samples.filter((_, otherIndex) => otherIndex !== index);
        const mean = average(others);
        const deviation = standardDeviation(others, mean);
        return Math.abs(sample - mean) <= (2 * deviation) + SIGMA_EPSILON;
      });
      return kept.length > 0 ? average(kept) : average(samples);
    }
  }
}

export class DistanceEstimator {
  readonly options: DistanceEstimatorOptions;
  private readonly windows = new Map<string, number[]>();

  constructor(options: Partial<DistanceEstimatorOptions> = {}) {
    this.options = {
      ...DEFAULT_ESTIMATOR_OPTIONS,
      ...options,
      volume: { ...DEFAULT_VOLUME_CURVE, ...options.volume },
    };
    assertValidOptions(this.options);
  }

  rssiToDistance(rssi: number): number {
    return rssiToDistance(
      rssi,
      this.options.measuredPowerDbm,
      this.options.pathLossExponent,
      this.options.distanceClamp,
    );
  }

  addSample(peerId: string, rawValue: number): number {
    let window = this.windows.get(peerId);
    if (!window) {
      window = [];
      this.windows.set(peerId, window);
    }
    window.push(rawValue);
    while (window.length > this.options.smoothingWindow) {
      window.shift();
    }
    return smoothSamples(window, this.options.smoothingPolicy);
  }

  sampleCount(peerId: string): number {
    return this.windows.get(peerId)?.length ?? 0;
  }

  resetPeer(peerId: string): void {
    this.windows.get(peerId)?.splice(0);
  }

  removePeer(peerId: string): void {
    this.windows.delete(peerId);
  }

  distanceLevel(distance: number): DistanceLevel {
    return distanceLevel(distance, this.options.tierProfile);
  }

  volumeForDistance(distance: number): number {
    return volumeForDistance(distance, this.options.volume);
  }
}
