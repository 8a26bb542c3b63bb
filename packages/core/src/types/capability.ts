export type NeuralCapability =
  | { status: 'available' }
  | { status: 'unavailable'; reason: string }
  | { status: 'insufficient'; reason: string }
  | { status: 'no-model'; reason: string };

export interface MemoryInfo {
  totalMb: number;
  freeMb: number;
}

export interface CapabilityDetails {
  runtimeAvailable: boolean;
  resourcesAdequate: boolean;
  modelAvailable: boolean;
  /** Where the detector looks for the ONNX model file. */
  modelPath: string;
  memoryInfo: MemoryInfo;
  cpuCount: number;
}

export type CapabilityTier = 'full' | 'tfidf' | 'none';
