import type { BarConfig } from "../config/types.js";
import type { BoundsMap, Size } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { ModuleRegistry } from "../modules/registry.js";
import type { Rasterizer } from "../render/surface.js";
import type { AsyncBridge } from "./asyncBridge.js";

/**
 * Everything an entry point of the bar may touch, passed explicitly.
 * Getters return the value current at call time.
 */
export type BarContext = Readonly<{
  registry: ModuleRegistry;
  rasterizer: Rasterizer;
  logger: BarLogger;
  bridge: AsyncBridge;
  config: () => BarConfig;
  size: () => Size;
  bounds: () => BoundsMap;
}>;
