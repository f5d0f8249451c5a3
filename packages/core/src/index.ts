/**
 * @stripbar/core
 *
 * Runtime-agnostic core of the status bar: module registry, layout, hit
 * testing, drag reorder and the serial event loop.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors & logging
// =============================================================================

export { StripbarError, type StripbarErrorCode, describeThrown, invalidConfig } from "./errors.js";
export type { BarLogger } from "./logger.js";

// =============================================================================
// Configuration
// =============================================================================

export type {
  BarConfig,
  BarConfigInput,
  BatteryOptions,
  BluetoothOptions,
  ClipboardOptions,
  ClockOptions,
  DiskOptions,
  GpuOptions,
  KeyboardLayoutOptions,
  LayoutOptions,
  MediaOptions,
  ModulesOptions,
  NetworkOptions,
  SectionOrder,
  SystemInfoOptions,
  TemperatureUnit,
  UptimeOptions,
  VolumeOptions,
  WeatherOptions,
} from "./config/types.js";
export { DEFAULT_BAR_CONFIG } from "./config/defaults.js";
export { resolveBarConfig, resolveSectionOrder } from "./config/resolve.js";
export { type ConfigListener, type ConfigStore, createConfigStore } from "./config/store.js";

// =============================================================================
// Events
// =============================================================================

export type {
  BarEvent,
  BarEventKind,
  ModuleCommand,
  PointerButton,
  ReorderCommit,
  ReorderableSection,
} from "./events.js";

// =============================================================================
// Layout & hit testing
// =============================================================================

export {
  type BoundsMap,
  EMPTY_RECT,
  type Point,
  type Rect,
  SECTIONS,
  type Section,
  type Size,
  type TextMetrics,
} from "./layout/types.js";
export { centerVertically, contains, midpointX, rectRight, rectsOverlap } from "./layout/rect.js";
export { type HitResult, hitTest, hitTestWithRect } from "./layout/hitTest.js";
export {
  type MeasuredItem,
  type PackOptions,
  type PackedBar,
  type PackedSection,
  type PlacedItem,
  packCenter,
  packLeft,
  packRight,
  packSections,
  toBoundsMap,
} from "./layout/sections.js";
export { type FrameText, measureSections } from "./layout/measure.js";
export { type FrameInput, type FrameResult, type LayoutPass, LayoutEngine } from "./layout/layoutEngine.js";

// =============================================================================
// Modules
// =============================================================================

export {
  type BarModule,
  type ModuleActionContext,
  moduleIsVisible,
  moduleTooltip,
} from "./modules/types.js";
export { type ModuleClass, type ModulePlacement, ModuleRegistry } from "./modules/registry.js";
export { ModuleStateCell, type Published } from "./modules/stateCell.js";

// =============================================================================
// Interaction
// =============================================================================

export {
  type DragPreview,
  type DragState,
  type InteractionPhase,
  dragPreviewOf,
  phaseOf,
} from "./interaction/dragState.js";
export {
  type ReorderPlan,
  computeInsertionIndex,
  insertionCaretX,
  planReorder,
  visualOrder,
} from "./interaction/reorder.js";
export { type InteractionHost, InteractionController } from "./interaction/controller.js";

// =============================================================================
// Rendering & theme
// =============================================================================

export { type Rgb24, type TextStyle, parseHexColor, rgb, rgbB, rgbG, rgbR } from "./render/style.js";
export type { OffscreenBuffer, Rasterizer } from "./render/surface.js";
export { BackBuffer } from "./render/backBuffer.js";
export { type DrawFrameInput, IDLE_VIEW, type InteractionView, drawFrame } from "./render/drawFrame.js";
export { type BarTheme, type ThemeName, darkTheme, lightTheme, resolveTheme } from "./theme/theme.js";

// =============================================================================
// Runtime
// =============================================================================

export { type AsyncBridge, type BridgeScheduler, createAsyncBridge } from "./runtime/asyncBridge.js";
export type { BarContext } from "./runtime/context.js";
export { BarRuntime, type BarRuntimeOptions } from "./runtime/barRuntime.js";
