// src/cli/args.ts
import { parseArgs } from "node:util";
import { z } from "zod";
import { AxisConventionSchema, LoadCaseSpecSchema, SupportTypeSchema, UnitsSchema } from "../engine/schema";
import { TOPOLOGY_KINDS } from "../engine/types";

export const USAGE = `usage: topogen <kind> [--set key=value]... [--config job.json]
               [--out model.json] [--takeoff takeoff.csv] [--up y|z] [--units m]
               [--name project] [--support fixed|pinned] [--preview]
kinds: ${TOPOLOGY_KINDS.join(", ")}`;

export const JobSchema = z.object({
  kind: z.enum(TOPOLOGY_KINDS).optional(),
  params: z.record(z.string(), z.unknown()).default({}),
  export: z.object({
    name: z.string().optional(),
    units: UnitsSchema.optional(),
    up: AxisConventionSchema.optional(),
    support: SupportTypeSchema.optional(),
    loads: z.array(LoadCaseSpecSchema).optional()
  }).default({})
});

export type Job = z.infer<typeof JobSchema>;

export interface CliOptions {
  kind?: string;
  sets: Record<string, unknown>;
  config?: string;
  out?: string;
  takeoff?: string;
  up?: "y-up" | "z-up";
  units?: z.infer<typeof UnitsSchema>;
  name?: string;
  support?: z.infer<typeof SupportTypeSchema>;
  preview: boolean;
  help: boolean;
}

/** "12" -> 12, "true" -> true, anything else stays a string */
export function parseValue(raw: string): unknown {
  if (raw === "true") return true;
  if (raw === "false") return false;
  const n = Number(raw);
  return raw.trim() !== "" && Number.isFinite(n) ? n : raw;
}

/** Writes `value` under a dotted path, creating nested objects as needed. */
export function setPath(target: Record<string, unknown>, path: string, value: unknown) {
  const parts = path.split(".");
  const last = parts.pop();
  if (!last || parts.some(p => p === "")) throw new Error(`Bad parameter name: ${path}`);
  let node = target;
  for (const part of parts) {
    const child = node[part];
    const next: Record<string, unknown> = isRecord(child) ? { ...child } : {};
    node[part] = next;
    node = next;
  }
  node[last] = value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      set: { type: "string", short: "s", multiple: true },
      config: { type: "string", short: "c" },
      out: { type: "string", short: "o" },
      takeoff: { type: "string", short: "t" },
      up: { type: "string" },
      units: { type: "string" },
      name: { type: "string" },
      support: { type: "string" },
      preview: { type: "boolean", short: "p" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (positionals.length > 1) throw new Error(`Expected one topology kind, got ${positionals.join(" ")}`);

  const sets: Record<string, unknown> = {};
  for (const pair of values.set ?? []) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new Error(`--set expects key=value, got ${pair}`);
    setPath(sets, pair.slice(0, eq), parseValue(pair.slice(eq + 1)));
  }

  let up: CliOptions["up"];
  if (values.up !== undefined) {
    const parsed = AxisConventionSchema.safeParse(values.up.endsWith("-up") ? values.up : `${values.up}-up`);
    if (!parsed.success) throw new Error(`--up expects y or z, got ${values.up}`);
    up = parsed.data;
  }

  let units: CliOptions["units"];
  if (values.units !== undefined) {
    const parsed = UnitsSchema.safeParse(values.units);
    if (!parsed.success) throw new Error(`--units expects mm, m, in or ft, got ${values.units}`);
    units = parsed.data;
  }

  let support: CliOptions["support"];
  if (values.support !== undefined) {
    const parsed = SupportTypeSchema.safeParse(values.support);
    if (!parsed.success) throw new Error(`--support expects fixed or pinned, got ${values.support}`);
    support = parsed.data;
  }

  return {
    kind: positionals[0],
    sets,
    config: values.config,
    out: values.out,
    takeoff: values.takeoff,
    up,
    units,
    name: values.name,
    support,
    preview: values.preview ?? false,
    help: values.help ?? false
  };
}

/** Deep-merges `overrides` onto `base` without touching either. */
export function mergeParams(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(overrides)) {
    const prev = out[k];
    out[k] = isRecord(prev) && isRecord(v) ? mergeParams(prev, v) : v;
  }
  return out;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
