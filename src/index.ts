export * from "./types";
export * from "./pga";
export { Vec3 } from "./math/Vec3";
export {
  DEFAULT_KERNEL_OPTIONS,
  createKernelConfig,
  type KernelOptions,
} from "./config/kernelConfig";
