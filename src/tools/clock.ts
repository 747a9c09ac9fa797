/**
 * Built-in clock tool: reports the current time, optionally in an IANA time zone.
 */
import { definitionFromSpec } from "../formats/tool-definitions.js";
import type { ToolSpec } from "../formats/tool-definitions.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolHandler } from "./types.js";

export const CLOCK_TOOL_NAME = "clock";

export const clockToolSpec: ToolSpec = {
  name: CLOCK_TOOL_NAME,
  description:
    "Report the current date and time. Pass an IANA time zone (e.g. \"Europe/Paris\") to get local time; defaults to UTC.",
  parameters: {
    type: "object",
    properties: {
      timezone: { type: "string", description: "IANA time zone name. Defaults to UTC." },
    },
  },
};

export interface ClockReading {
  iso: string;
  timezone: string;
  local: string;
}

/** Handler factory. `now` is injectable so tests get a fixed instant. */
export function clockHandler(now: () => Date = () => new Date()): ToolHandler {
  return (args) => {
    const timezone = typeof args.timezone === "string" && args.timezone ? args.timezone : "UTC";
    const instant = now();
    // Throws RangeError on an unknown zone; the loop reports it as an error result.
    const local = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    }).format(instant);
    const reading: ClockReading = { iso: instant.toISOString(), timezone, local };
    return reading;
  };
}

export function registerClockTool(registry: ToolRegistry, now?: () => Date): void {
  registry.register(CLOCK_TOOL_NAME, definitionFromSpec(clockToolSpec), clockHandler, now);
}
