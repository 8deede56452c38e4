// src/cli/run.ts
import { computeTakeoff } from "../engine/bom";
import { InvalidParameterError } from "../engine/errors";
import { toStructuralModel } from "../engine/export";
import { countRoles, generateUnknown, isTopologyKind, previewUnknown } from "../engine/generate";
import type { GenerationResult, ModelPreview, RoleCounts, TopologyKind } from "../engine/types";
import { exportCsv, exportJson, readJsonFile } from "../utils/fileio";
import { JobSchema, USAGE, mergeParams, parseCliArgs, type Job } from "./args";

async function loadJob(path?: string): Promise<Job> {
  if (path === undefined) return JobSchema.parse({});
  const parsed = JobSchema.safeParse(await readJsonFile(path));
  if (!parsed.success) throw new Error(`${path}: ${parsed.error.message}`);
  return parsed.data;
}

const formatRoles = (byRole: RoleCounts) =>
  Object.entries(byRole).map(([role, n]) => `${role}=${n}`).join(" ");

export function formatPreview(p: ModelPreview): string[] {
  const lines = [
    `${p.kind}: ${p.joints} joints, ${p.members} members, ${p.plates} plates`,
    `  roles: ${formatRoles(p.byRole)}`,
    `  ${Object.entries(p.derived).map(([k, v]) => `${k}=${+v.toFixed(3)}`).join(" ")}`
  ];
  p.warnings.forEach(w => lines.push(`  warning: ${w}`));
  return lines;
}

export function formatResult(r: GenerationResult): string[] {
  const lines = [
    `${r.kind}: ${r.joints.size} joints, ${r.members.size} members, ${r.plates.size} plates`,
    `  roles: ${formatRoles(countRoles(r))}`,
    `  landmarks: ${Object.entries(r.landmarks).map(([name, ids]) => `${name}(${ids.length})`).join(" ")}`
  ];
  r.warnings.forEach(w => lines.push(`  warning: ${w}`));
  return lines;
}

/** Runs one command line; resolves to the process exit code. */
export async function run(argv: string[]): Promise<number> {
  try {
    const opts = parseCliArgs(argv);
    if (opts.help) {
      console.log(USAGE);
      return 0;
    }
    const job = await loadJob(opts.config);
    const kindName = opts.kind ?? job.kind;
    if (kindName === undefined || !isTopologyKind(kindName)) {
      console.error(kindName === undefined ? "No topology kind given" : `Unknown topology kind: ${kindName}`);
      console.error(USAGE);
      return 1;
    }
    const kind: TopologyKind = kindName;
    const params = mergeParams(job.params, opts.sets);

    if (opts.preview) {
      formatPreview(previewUnknown(kind, params)).forEach(line => console.log(line));
      return 0;
    }

    const result = generateUnknown(kind, params);
    formatResult(result).forEach(line => console.log(line));

    if (opts.out !== undefined || opts.takeoff !== undefined) {
      const model = toStructuralModel(result, {
        name: opts.name ?? job.export.name ?? kind,
        units: opts.units ?? job.export.units ?? "m",
        up: opts.up ?? job.export.up,
        support: opts.support ?? job.export.support,
        loads: job.export.loads
      });
      if (opts.out !== undefined) {
        await exportJson(model, opts.out);
        console.log(`Wrote ${opts.out}`);
      }
      if (opts.takeoff !== undefined) {
        await exportCsv(opts.takeoff, computeTakeoff(model).rows);
        console.log(`Wrote ${opts.takeoff}`);
      }
    }
    return 0;
  } catch (err) {
    if (err instanceof InvalidParameterError) {
      console.error(err.name);
      err.issues.forEach(i => console.error(`  ${i.parameter}: ${i.constraint}`));
      return 1;
    }
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
