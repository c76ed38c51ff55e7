/**
 * Constants Module
 *
 * Re-exports timeouts, default values and the CUDA setup sequence.
 */

export * from "./timeouts";
export * from "./defaults";
export * from "./cuda-setup";
