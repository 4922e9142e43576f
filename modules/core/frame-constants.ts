/**
 * Fixed parameters of the reference-frame model.
 * Self-adjustment and node normalization share one damping factor.
 */

export const PHI = (1 + Math.sqrt(5)) / 2;

export const FRAME_CONSTANTS = {
  // Self-adjustment (top-down through nesting)
  DAMPING_FACTOR: 0.95,
  PHASE_STEP: Math.PI / 180, // rad

  // Propagation (one hop across peer links)
  PROPAGATION_FACTOR: 0.98,
  PROPAGATION_PHASE_STEP: Math.PI / 360, // rad, subtracted

  // Boundary coherence
  COHERENCE_THRESHOLD: 0.618,
  SEALED_COHERENCE: 1.0,

  // Reported conditions
  DIVERGENCE_CUTOFF: 100,

  // Misuse guard for cyclic nesting
  DEFAULT_MAX_NESTING_DEPTH: 256,

  // Initial phase offset of a scenario frame: π/φ
  GOLDEN_PHASE: Math.PI / PHI,
} as const;

/**
 * Round to the 3 decimals used by every rendering.
 */
export function fixed3(value: number): string {
  return value.toFixed(3);
}
