/**
 * Wall clock. Reads the time once per update() so a frame shows one
 * consistent value; the width sample reserves room for the widest rendering.
 */

import type { BarConfig, BarModule, ClockOptions } from "@stripbar/core";

const DAY_SHORT = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
const DAY_LONG = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;
const MONTH_SHORT = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;
const MONTH_LONG = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/** Wednesday 27 December, 23:58:58: widest names, digits and meridiem. */
const WIDTH_SAMPLE_DATE = new Date(2000, 11, 27, 23, 58, 58);

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function hour12(d: Date): string {
  const h = d.getHours() % 12;
  return pad2(h === 0 ? 12 : h);
}

function meridiem(d: Date): string {
  return d.getHours() < 12 ? "AM" : "PM";
}

export type ClockFormat = Pick<ClockOptions, "format24h" | "showSeconds" | "showDate" | "showDay">;

export function formatClock(d: Date, opts: ClockFormat): string {
  let text = "";
  if (opts.showDay) text += `${DAY_SHORT[d.getDay()] ?? ""} `;
  if (opts.showDate) text += `${MONTH_SHORT[d.getMonth()] ?? ""} ${pad2(d.getDate())}  `;
  const seconds = opts.showSeconds ? `:${pad2(d.getSeconds())}` : "";
  if (opts.format24h) {
    text += `${pad2(d.getHours())}:${pad2(d.getMinutes())}${seconds}`;
  } else {
    text += `${hour12(d)}:${pad2(d.getMinutes())}${seconds} ${meridiem(d)}`;
  }
  return text;
}

export function formatClockTooltip(d: Date): string {
  const date = `${DAY_LONG[d.getDay()] ?? ""}, ${MONTH_LONG[d.getMonth()] ?? ""} ${pad2(d.getDate())}, ${String(d.getFullYear())}`;
  const time = `${hour12(d)}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())} ${meridiem(d)}`;
  return `${date}\n${time}`;
}

export class ClockModule implements BarModule {
  readonly id = "clock";
  readonly name = "Clock";
  private readonly clock: () => Date;
  private current: Date;

  constructor(opts: Readonly<{ clock?: () => Date }> = {}) {
    this.clock = opts.clock ?? (() => new Date());
    this.current = this.clock();
  }

  update(_config: BarConfig): void {
    this.current = this.clock();
  }

  displayText(config: BarConfig): string {
    return formatClock(this.current, config.modules.clock);
  }

  widthSample(config: BarConfig): string {
    return formatClock(WIDTH_SAMPLE_DATE, config.modules.clock);
  }

  tooltip(): string {
    return formatClockTooltip(this.current);
  }

  emphasized(): boolean {
    return true;
  }
}
