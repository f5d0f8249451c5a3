import type { BarConfig, BarModule, ModuleActionContext } from "@stripbar/core";

export type StubModuleOptions = Readonly<{
  text?: string;
  name?: string;
  tooltip?: string | null;
  preferredWidth?: number | null;
  widthSample?: string | null;
}>;

/** Scriptable module that records every call made to it. */
export class StubModule implements BarModule {
  readonly id: string;
  readonly name: string;
  text: string;
  visible = true;
  tooltipText: string | null;
  preferred: number | null;
  sample: string | null;
  throwOnUpdate = false;
  throwOnText = false;

  updates = 0;
  disposed = 0;
  readonly clicks: ModuleActionContext[] = [];
  readonly rightClicks: ModuleActionContext[] = [];
  readonly scrolls: number[] = [];

  constructor(id: string, opts: StubModuleOptions = {}) {
    this.id = id;
    this.name = opts.name ?? id;
    this.text = opts.text ?? id;
    this.tooltipText = opts.tooltip ?? null;
    this.preferred = opts.preferredWidth ?? null;
    this.sample = opts.widthSample ?? null;
  }

  displayText(_config: BarConfig): string {
    if (this.throwOnText) throw new Error(`${this.id}: displayText failed`);
    return this.text;
  }

  update(_config: BarConfig): void {
    this.updates++;
    if (this.throwOnUpdate) throw new Error(`${this.id}: update failed`);
  }

  onClick(ctx: ModuleActionContext): void {
    this.clicks.push(ctx);
  }

  onRightClick(ctx: ModuleActionContext): void {
    this.rightClicks.push(ctx);
  }

  onScroll(delta: number, _ctx: ModuleActionContext): void {
    this.scrolls.push(delta);
  }

  tooltip(): string | null {
    return this.tooltipText;
  }

  isVisible(): boolean {
    return this.visible;
  }

  preferredWidth(): number | null {
    return this.preferred;
  }

  widthSample(_config: BarConfig): string | null {
    return this.sample;
  }

  dispose(): void {
    this.disposed++;
  }
}

export function createStubModule(id: string, opts?: StubModuleOptions): StubModule {
  return new StubModule(id, opts);
}
