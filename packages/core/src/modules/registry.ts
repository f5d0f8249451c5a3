/**
 * packages/core/src/modules/registry.ts — Module ownership and section views.
 *
 * The registry owns every module instance for the lifetime of the bar and
 * keeps the resolved id list of each section. Order lists come from the
 * configuration snapshot; the registry never invents or persists order.
 *
 * Invariants:
 *   - an id appears in at most one section (enforced by resolveSectionOrder)
 *   - an unknown id in an order list renders nothing and is never fatal
 */

import { resolveSectionOrder } from "../config/resolve.js";
import type { BarConfig, SectionOrder } from "../config/types.js";
import { describeThrown } from "../errors.js";
import { SECTIONS, type Section } from "../layout/types.js";
import type { BarLogger } from "../logger.js";
import type { BarModule } from "./types.js";

/** Constructor of a concrete module class, used by queryAs(). */
export type ModuleClass<T extends BarModule> = abstract new (...args: never[]) => T;

export type ModulePlacement = Readonly<{ section: Section; index: number }>;

const EMPTY_ORDER: SectionOrder = Object.freeze({
  left: Object.freeze([]),
  center: Object.freeze([]),
  right: Object.freeze([]),
});

export class ModuleRegistry {
  private readonly modules = new Map<string, BarModule>();
  private readonly logger: BarLogger;
  private order: SectionOrder = EMPTY_ORDER;
  private readonly reportedUnknown = new Set<string>();

  constructor(opts: Readonly<{ logger: BarLogger; modules?: readonly BarModule[] }>) {
    this.logger = opts.logger;
    for (const module of opts.modules ?? []) this.register(module);
  }

  /**
   * Insert a module by id. On collision the newer module replaces the older
   * one (hot swap); the replaced instance is disposed.
   */
  register(module: BarModule): void {
    const prev = this.modules.get(module.id);
    this.modules.set(module.id, module);
    if (prev !== undefined && prev !== module) {
      this.logger.debug({ moduleId: module.id }, "module replaced");
      this.disposeOne(prev);
    }
    this.reportedUnknown.delete(module.id);
  }

  get(id: string): BarModule | null {
    return this.modules.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.modules.has(id);
  }

  ids(): readonly string[] {
    return [...this.modules.keys()];
  }

  /**
   * Escape hatch for module-specific behavior (e.g. building a settings menu).
   * Returns null when the id is unknown or the module is of another class.
   */
  queryAs<T extends BarModule>(id: string, cls: ModuleClass<T>): T | null {
    const module = this.modules.get(id);
    return module instanceof cls ? module : null;
  }

  /**
   * Run every module's update hook. A throwing module is logged and skipped;
   * the returned list names the modules that failed this round.
   */
  updateAll(config: BarConfig): readonly string[] {
    const failed: string[] = [];
    for (const module of this.modules.values()) {
      try {
        module.update(config);
      } catch (err: unknown) {
        failed.push(module.id);
        this.logger.warn(
          { moduleId: module.id, code: "STRIPBAR_MODULE_FAILURE", detail: describeThrown(err) },
          "module update failed",
        );
      }
    }
    return failed;
  }

  /** Rebuild the section lists from a configuration snapshot. */
  applyConfig(config: BarConfig): void {
    const resolved = resolveSectionOrder(config);
    for (const id of resolved.duplicates) {
      this.logger.warn({ moduleId: id }, "module listed in more than one section; later entry ignored");
    }
    this.order = resolved.order;
    this.reportedUnknown.clear();
  }

  /**
   * Replace one section's list. Repeats within `ids` are dropped and the ids
   * are removed from the other sections, so every id stays in one section.
   */
  setOrder(section: Section, ids: readonly string[]): void {
    const taken = new Set(ids);
    const listFor = (s: Section): readonly string[] =>
      s === section ? Object.freeze([...taken]) : Object.freeze(this.order[s].filter((id) => !taken.has(id)));
    this.order = Object.freeze({ left: listFor("left"), center: listFor("center"), right: listFor("right") });
  }

  /** The resolved id list of a section, including ids with no registered module. */
  sectionIds(section: Section): readonly string[] {
    return this.order[section];
  }

  /** Registered modules of a section, in list order. Unknown ids are skipped. */
  orderedModules(section: Section): readonly BarModule[] {
    const out: BarModule[] = [];
    for (const id of this.order[section]) {
      const module = this.modules.get(id);
      if (module === undefined) {
        this.reportUnknown(section, id);
        continue;
      }
      out.push(module);
    }
    return out;
  }

  placementOf(id: string): ModulePlacement | null {
    for (const section of SECTIONS) {
      const index = this.order[section].indexOf(id);
      if (index >= 0) return Object.freeze({ section, index });
    }
    return null;
  }

  disposeAll(): void {
    for (const module of this.modules.values()) this.disposeOne(module);
  }

  private disposeOne(module: BarModule): void {
    if (!module.dispose) return;
    try {
      module.dispose();
    } catch (err: unknown) {
      this.logger.warn({ moduleId: module.id, detail: describeThrown(err) }, "module dispose failed");
    }
  }

  private reportUnknown(section: Section, id: string): void {
    if (this.reportedUnknown.has(id)) return;
    this.reportedUnknown.add(id);
    this.logger.warn({ moduleId: id, section }, "unknown module id in section order; skipped");
  }
}
