import { existsSync } from 'node:fs';
import { availableParallelism, freemem, homedir, totalmem } from 'node:os';
import { join, resolve } from 'node:path';
import type {
  CapabilityDetails,
  CapabilityTier,
  NeuralCapability,
} from '../types/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CapabilityDetectorConfig {
  /** Library files probed after ORT_DYLIB_PATH and LD_LIBRARY_PATH. */
  runtimeLibraries: readonly string[];
  /** Defaults to ~/.sift/models/model.onnx. */
  modelPath?: string;
  minMemoryMb: number;
}

export const RUNTIME_LIBRARY_NAME = 'libonnxruntime.so';
export const DISABLE_NEURAL_ENV = 'SIFT_DISABLE_NEURAL';

const BYTES_PER_MB = 1024 * 1024;

// ---------------------------------------------------------------------------
// Host probes (injectable for testing)
// ---------------------------------------------------------------------------

export interface SystemProbe {
  env(name: string): string | undefined;
  fileExists(path: string): boolean;
  totalMemoryBytes(): number;
  freeMemoryBytes(): number;
  cpuCount(): number;
  homeDir(): string;
}

export function createDefaultSystemProbe(): SystemProbe {
  return {
    env: (name) => process.env[name],
    fileExists: (path) => existsSync(path),
    totalMemoryBytes: () => totalmem(),
    freeMemoryBytes: () => freemem(),
    cpuCount: () => availableParallelism(),
    homeDir: () => homedir(),
  };
}

// ---------------------------------------------------------------------------
// CapabilityDetector
// ---------------------------------------------------------------------------

/**
 * Decides whether neural-embedding search can run on this host.
 *
 * `detect()` checks runtime library, memory and model in that order and
 * reports the first failure. Callers are expected to run it once per
 * process and pass the result around.
 */
export class CapabilityDetector {
  private readonly config: CapabilityDetectorConfig;
  private readonly probe: SystemProbe;

  constructor(config: CapabilityDetectorConfig, probe: SystemProbe = createDefaultSystemProbe()) {
    this.config = config;
    this.probe = probe;
  }

  detect(): NeuralCapability {
    if (this.probe.env(DISABLE_NEURAL_ENV) !== undefined) {
      return { status: 'unavailable', reason: 'Neural runtime disabled by environment variable' };
    }
    if (!this.runtimeAvailable()) {
      return { status: 'unavailable', reason: 'Neural runtime library not found' };
    }
    if (!this.resourcesAdequate()) {
      const gb = this.config.minMemoryMb / 1024;
      return { status: 'insufficient', reason: `Insufficient RAM (< ${gb}GB)` };
    }
    if (!this.modelAvailable()) {
      return { status: 'no-model', reason: `Neural model not found at ${this.modelPath}` };
    }
    return { status: 'available' };
  }

  /** Every check, without short-circuiting. For status output. */
  capabilityDetails(): CapabilityDetails {
    return {
      runtimeAvailable: this.runtimeAvailable(),
      resourcesAdequate: this.resourcesAdequate(),
      modelAvailable: this.modelAvailable(),
      modelPath: this.modelPath,
      memoryInfo: {
        totalMb: Math.floor(this.probe.totalMemoryBytes() / BYTES_PER_MB),
        freeMb: Math.floor(this.probe.freeMemoryBytes() / BYTES_PER_MB),
      },
      cpuCount: Math.max(1, this.probe.cpuCount()),
    };
  }

  get modelPath(): string {
    return this.config.modelPath ?? join(this.probe.homeDir(), '.sift', 'models', 'model.onnx');
  }

  runtimeCandidates(): string[] {
    const candidates: string[] = [];
    const explicit = this.probe.env('ORT_DYLIB_PATH');
    if (explicit) {
      candidates.push(explicit);
    }
    const searchPath = this.probe.env('LD_LIBRARY_PATH');
    if (searchPath) {
      for (const dir of searchPath.split(':')) {
        if (dir.length > 0) {
          candidates.push(join(dir, RUNTIME_LIBRARY_NAME));
        }
      }
    }
    candidates.push(...this.config.runtimeLibraries);
    return candidates;
  }

  private runtimeAvailable(): boolean {
    if (this.probe.env(DISABLE_NEURAL_ENV) !== undefined) {
      return false;
    }
    return this.runtimeCandidates().some((candidate) => this.probe.fileExists(resolve(candidate)));
  }

  private resourcesAdequate(): boolean {
    return this.probe.totalMemoryBytes() >= this.config.minMemoryMb * BYTES_PER_MB;
  }

  private modelAvailable(): boolean {
    return this.probe.fileExists(this.modelPath);
  }
}

// ---------------------------------------------------------------------------
// Reporting helpers
// ---------------------------------------------------------------------------

export function capabilityTier(details: CapabilityDetails): CapabilityTier {
  if (details.runtimeAvailable && details.resourcesAdequate && details.modelAvailable) {
    return 'full';
  }
  if (details.resourcesAdequate) {
    return 'tfidf';
  }
  return 'none';
}

export function capabilityRecommendations(details: CapabilityDetails): string[] {
  const recommendations: string[] = [];
  if (!details.runtimeAvailable) {
    recommendations.push('Install ONNX Runtime for neural embeddings');
  }
  if (!details.resourcesAdequate) {
    recommendations.push('Upgrade to 4GB+ RAM for neural embeddings');
  }
  if (!details.modelAvailable) {
    recommendations.push(
      `Place the ONNX model at ${details.modelPath} (or point capability.modelPath in .sift.yaml at it)`,
    );
  }
  return recommendations;
}
