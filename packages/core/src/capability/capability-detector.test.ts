import { describe, it, expect, vi } from 'vitest';
import {
  CapabilityDetector,
  capabilityRecommendations,
  capabilityTier,
  type CapabilityDetectorConfig,
  type SystemProbe,
} from './capability-detector.js';

const GB = 1024 * 1024 * 1024;

const config: CapabilityDetectorConfig = {
  runtimeLibraries: ['/usr/lib/libonnxruntime.so'],
  modelPath: '/models/model.onnx',
  minMemoryMb: 4096,
};

function createProbe(options: {
  files?: string[];
  env?: Record<string, string>;
  totalMemory?: number;
}): SystemProbe {
  const files = new Set(options.files ?? []);
  return {
    env: (name) => options.env?.[name],
    fileExists: vi.fn((path: string) => files.has(path)),
    totalMemoryBytes: () => options.totalMemory ?? 16 * GB,
    freeMemoryBytes: () => 2 * GB,
    cpuCount: () => 8,
    homeDir: () => '/home/test',
  };
}

describe('CapabilityDetector.detect', () => {
  it('should report available when every check passes', () => {
    const probe = createProbe({ files: ['/usr/lib/libonnxruntime.so', '/models/model.onnx'] });
    expect(new CapabilityDetector(config, probe).detect()).toEqual({ status: 'available' });
  });

  it('should report unavailable when the runtime is missing even if memory is short too', () => {
    const probe = createProbe({ files: ['/models/model.onnx'], totalMemory: 1 * GB });
    expect(new CapabilityDetector(config, probe).detect()).toEqual({
      status: 'unavailable',
      reason: 'Neural runtime library not found',
    });
  });

  it('should report insufficient memory before checking the model', () => {
    const probe = createProbe({ files: ['/usr/lib/libonnxruntime.so'], totalMemory: 2 * GB });
    const detector = new CapabilityDetector(config, probe);

    expect(detector.detect()).toEqual({ status: 'insufficient', reason: 'Insufficient RAM (< 4GB)' });
    expect(probe.fileExists).not.toHaveBeenCalledWith('/models/model.onnx');
  });

  it('should report a missing model last', () => {
    const probe = createProbe({ files: ['/usr/lib/libonnxruntime.so'] });
    expect(new CapabilityDetector(config, probe).detect()).toEqual({
      status: 'no-model',
      reason: 'Neural model not found at /models/model.onnx',
    });
  });

  it('should honour the disable switch', () => {
    const probe = createProbe({
      files: ['/usr/lib/libonnxruntime.so', '/models/model.onnx'],
      env: { SIFT_DISABLE_NEURAL: '1' },
    });
    expect(new CapabilityDetector(config, probe).detect()).toEqual({
      status: 'unavailable',
      reason: 'Neural runtime disabled by environment variable',
    });
  });

  it('should find the runtime through ORT_DYLIB_PATH and LD_LIBRARY_PATH', () => {
    const viaEnv = createProbe({
      files: ['/opt/ort/lib.so', '/models/model.onnx'],
      env: { ORT_DYLIB_PATH: '/opt/ort/lib.so' },
    });
    const viaSearchPath = createProbe({
      files: ['/opt/b/libonnxruntime.so', '/models/model.onnx'],
      env: { LD_LIBRARY_PATH: '/opt/a::/opt/b' },
    });

    expect(new CapabilityDetector(config, viaEnv).detect().status).toBe('available');
    expect(new CapabilityDetector(config, viaSearchPath).detect().status).toBe('available');
  });

  it('should look for the model under the home directory by default', () => {
    const probe = createProbe({
      files: ['/usr/lib/libonnxruntime.so', '/home/test/.sift/models/model.onnx'],
    });
    const detector = new CapabilityDetector({ runtimeLibraries: config.runtimeLibraries, minMemoryMb: 4096 }, probe);

    expect(detector.modelPath).toBe('/home/test/.sift/models/model.onnx');
    expect(detector.detect().status).toBe('available');
  });
});

describe('CapabilityDetector.capabilityDetails', () => {
  it('should report every check without short-circuiting', () => {
    const probe = createProbe({ files: ['/models/model.onnx'], totalMemory: 2 * GB });

    expect(new CapabilityDetector(config, probe).capabilityDetails()).toEqual({
      runtimeAvailable: false,
      resourcesAdequate: false,
      modelAvailable: true,
      modelPath: '/models/model.onnx',
      memoryInfo: { totalMb: 2048, freeMb: 2048 },
      cpuCount: 8,
    });
  });
});

describe('capabilityTier and capabilityRecommendations', () => {
  const base = {
    runtimeAvailable: true,
    resourcesAdequate: true,
    modelAvailable: true,
    modelPath: '/models/model.onnx',
    memoryInfo: { totalMb: 16384, freeMb: 8192 },
    cpuCount: 4,
  };

  it('should derive the tier from the checks', () => {
    expect(capabilityTier(base)).toBe('full');
    expect(capabilityTier({ ...base, modelAvailable: false })).toBe('tfidf');
    expect(capabilityTier({ ...base, runtimeAvailable: false })).toBe('tfidf');
    expect(capabilityTier({ ...base, resourcesAdequate: false })).toBe('none');
  });

  it('should list remedies in runtime, memory, model order', () => {
    expect(capabilityRecommendations(base)).toEqual([]);
    expect(
      capabilityRecommendations({
        ...base,
        runtimeAvailable: false,
        resourcesAdequate: false,
        modelAvailable: false,
      }),
    ).toEqual([
      'Install ONNX Runtime for neural embeddings',
      'Upgrade to 4GB+ RAM for neural embeddings',
      'Place the ONNX model at /models/model.onnx (or point capability.modelPath in .sift.yaml at it)',
    ]);
  });
});
