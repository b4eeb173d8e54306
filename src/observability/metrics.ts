import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: "rpki_mcp_" });

export const upstreamDuration = new Histogram({
  name: "rpki_mcp_upstream_duration_seconds",
  help: "Duration histogram for upstream relying-party calls",
  labelNames: ["endpoint", "result"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const toolCallCounter = new Counter({
  name: "rpki_mcp_tool_calls_total",
  help: "Total tool calls handled, by outcome",
  labelNames: ["tool", "result"],
  registers: [registry],
});

export function secondsSince(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000_000;
}
