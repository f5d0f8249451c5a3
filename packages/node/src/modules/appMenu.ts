import type { BarConfig, BarModule, ModuleActionContext } from "@stripbar/core";

/** The menu button at the far left; a click asks the host for the app menu. */
export class AppMenuModule implements BarModule {
  readonly id = "app_menu";
  readonly name = "App Menu";

  update(_config: BarConfig): void {}

  displayText(_config: BarConfig): string {
    return "☰";
  }

  onClick(ctx: ModuleActionContext): void {
    ctx.requestCommand({ kind: "showMenu", moduleId: this.id, anchor: ctx.anchor });
  }

  tooltip(): string {
    return "Click for menu";
  }
}
