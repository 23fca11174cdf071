/**
 * Tolerances and limits used across the kernel
 */
export interface KernelOptions {
  /** Per-coordinate tolerance for approxEq */
  readonly approxEpsilon: number;
  /** isZero threshold on the sum of squared coordinates */
  readonly zeroEpsilon: number;
  /** isValid threshold on the weight norm */
  readonly validityEpsilon: number;
  /** Entries kept by KernelDebugLogger */
  readonly debugLogLimit: number;
}

/**
 * Default kernel options
 */
export const DEFAULT_KERNEL_OPTIONS: KernelOptions = {
  approxEpsilon: 1e-6,
  zeroEpsilon: Number.EPSILON,
  validityEpsilon: Number.EPSILON,
  debugLogLimit: 100,
};

/**
 * Creates a kernel configuration from partial overrides.
 * Throws on tolerances that would make every comparison meaningless.
 */
export function createKernelConfig(options: Partial<KernelOptions> = {}): KernelOptions {
  const config = { ...DEFAULT_KERNEL_OPTIONS, ...options };

  for (const key of ["approxEpsilon", "zeroEpsilon", "validityEpsilon"] as const) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Kernel option "${key}" must be a finite non-negative number, got ${value}`);
    }
  }

  if (!Number.isInteger(config.debugLogLimit) || config.debugLogLimit <= 0) {
    throw new Error(
      `Kernel option "debugLogLimit" must be a positive integer, got ${config.debugLogLimit}`
    );
  }

  return config;
}
