import type { DistctlConfig, VariantConfig } from "../types/config.js";

export type MatrixEntry = Pick<VariantConfig, "name" | "selector" | "subdirectory">;

/** The variant matrix in the shape a CI `strategy.matrix.include` takes. */
export function variantMatrix(config: DistctlConfig): { include: MatrixEntry[] } {
  return {
    include: config.variants.map((v) => ({ name: v.name, selector: v.selector, subdirectory: v.subdirectory })),
  };
}
