import fs from "node:fs/promises";
import path from "node:path";
import {
  FrameScenarioManifest,
  FrameScenarioReport,
  type TFrameScenarioManifest,
  type TFrameScenarioManifestInput,
  type TFrameScenarioReport,
  type TFrameScenarioRoundResult,
} from "@shared/frame-scenario";
import { FRAME_CONSTANTS } from "../modules/core/frame-constants";
import { resolveFrameEnv } from "../modules/core/frame-env";
import { hashStableJson } from "../modules/core/stable-hash";
import { FrameGraph } from "../modules/frames/frame-graph";
import {
  createConsoleLoggerFactory,
  createFrameEventLog,
  type FrameLoggerFactory,
} from "../modules/frames/frame-logger";

export const ROOT_FRAME_ID = "root";
export const ROOT_BOUNDARY_ID = "root-boundary";

const DEFAULT_MANIFEST_PATH = path.resolve(
  process.cwd(),
  "datasets",
  "scenarios",
  "frame-scenario.fixture.json",
);

export async function loadFrameScenarioManifest(
  manifestPath = DEFAULT_MANIFEST_PATH,
): Promise<TFrameScenarioManifest> {
  const src = await fs.readFile(manifestPath, "utf8");
  return FrameScenarioManifest.parse(JSON.parse(src));
}

/**
 * Seeds `n0`/`n1`, the `root` frame holding both at phase π/φ, and one
 * boundary around them.
 */
export function initializeScenario(graph: FrameGraph, manifest: TFrameScenarioManifest): void {
  const [firstState, secondState] = manifest.seed_states;
  graph.createNode("n0", firstState);
  graph.createNode("n1", secondState);

  graph.createFrame(ROOT_FRAME_ID, {
    originNodeId: "n0",
    scale: manifest.initial_scale,
    phaseOffset: FRAME_CONSTANTS.GOLDEN_PHASE,
  });
  graph.attachNode(ROOT_FRAME_ID, "n0");
  graph.attachNode(ROOT_FRAME_ID, "n1");

  graph.createBoundary(ROOT_BOUNDARY_ID, manifest.boundary_coherence);
  graph.encloseNode(ROOT_BOUNDARY_ID, "n0");
  graph.encloseNode(ROOT_BOUNDARY_ID, "n1");
  graph.attachBoundary(ROOT_FRAME_ID, ROOT_BOUNDARY_ID);
}

/**
 * Adds `count` nodes. Each gets its own top-level frame and boundary, a
 * sub-frame sharing `n1`, and a peer link from `root`. Returns the new labels.
 */
export function growScenario(
  graph: FrameGraph,
  manifest: TFrameScenarioManifest,
  count: number,
): string[] {
  const added: string[] = [];
  for (let k = 0; k < count; k += 1) {
    const i = graph.nodes.length;
    const label = `n${i}`;
    const frameId = `frame-${i}`;
    const boundaryId = `boundary-${i}`;
    const subId = `sub-${i}`;

    graph.createNode(label, manifest.growth_state_step * i);
    graph.createFrame(frameId, {
      originNodeId: label,
      scale: manifest.initial_scale,
      phaseOffset: FRAME_CONSTANTS.GOLDEN_PHASE,
    });
    graph.attachNode(frameId, label);

    graph.createBoundary(boundaryId, manifest.boundary_coherence);
    graph.encloseNode(boundaryId, label);
    graph.attachBoundary(frameId, boundaryId);

    graph.createFrame(subId, { scale: manifest.sub_frame_scale, phaseOffset: 0 });
    graph.attachNode(subId, "n1");
    graph.nestFrame(frameId, subId);

    graph.linkFrames(ROOT_FRAME_ID, frameId);
    added.push(label);
  }
  return added;
}

export type FrameScenarioCliArgs = {
  manifest?: string;
  out?: string;
  quiet: boolean;
};

export function parseFrameScenarioArgs(args: string[]): FrameScenarioCliArgs {
  const parsed: FrameScenarioCliArgs = { quiet: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if ((token === "-m" || token === "--manifest") && args[i + 1]) {
      parsed.manifest = args[i + 1];
      i += 1;
    } else if ((token === "-o" || token === "--out") && args[i + 1]) {
      parsed.out = args[i + 1];
      i += 1;
    } else if (token === "--quiet") {
      parsed.quiet = true;
    }
  }
  return parsed;
}

export type RunFrameScenarioOptions = {
  loggerFor?: FrameLoggerFactory;
  eventCapacity?: number;
  maxNestingDepth?: number;
  manifest_path?: string;
  generated_at_iso?: string;
};

export function runFrameScenario(
  manifestInput: TFrameScenarioManifestInput,
  opts: RunFrameScenarioOptions = {},
): TFrameScenarioReport {
  const manifest = FrameScenarioManifest.parse(manifestInput);
  const env = resolveFrameEnv();
  const events = createFrameEventLog({
    capacity: opts.eventCapacity ?? env.eventBufferSize,
    forward: opts.loggerFor,
  });
  const graph = new FrameGraph({
    loggerFor: events.loggerFor,
    maxNestingDepth: opts.maxNestingDepth ?? env.maxNestingDepth,
  });

  initializeScenario(graph, manifest);

  const rounds: TFrameScenarioRoundResult[] = manifest.rounds.map((round, index) => {
    const added_nodes = growScenario(graph, manifest, round.add_nodes);
    const instability = graph.checkInstability(manifest.instability_threshold);
    if (round.perturb) {
      graph.perturbBoundaries(manifest.perturb_amount);
    }
    const coherence = round.validate ? graph.checkCoherence() : undefined;
    const resealed = round.validate ? graph.autoResealAll() : [];
    const repaired = coherence ? graph.sealBoundaries(coherence.violations) : [];
    return {
      round: index,
      added_nodes,
      instability,
      perturbed: round.perturb,
      coherence,
      resealed,
      repaired,
    };
  });

  const divergence = graph.checkDivergence();
  const snapshot = graph.snapshot();
  const eventStats = events.stats();

  const body = {
    name: manifest.name,
    rounds,
    divergence,
    counts: snapshot.counts,
    nodes: snapshot.nodes,
    frames: snapshot.frames,
    boundaries: snapshot.boundaries,
    events: { total: eventStats.totalEmitted, dropped: eventStats.dropped },
  };

  return FrameScenarioReport.parse({
    schema_version: "frame_scenario_report/1",
    kind: "frame_scenario_report",
    generated_at_iso: opts.generated_at_iso ?? new Date().toISOString(),
    manifest_path: opts.manifest_path,
    ...body,
    report_hash: hashStableJson(body),
  });
}

export function renderFrameScenarioSummary(report: TFrameScenarioReport): string {
  const { counts } = report;
  const lines = [
    `scenario ${report.name}`,
    `rounds=${report.rounds.length} nodes=${counts.nodes} frames=${counts.frames} ` +
      `boundaries=${counts.boundaries} peer_links=${counts.peerLinks} nesting_edges=${counts.nestingEdges}`,
  ];
  for (const round of report.rounds) {
    const parts = [
      `round ${round.round}: +${round.added_nodes.length} nodes`,
      round.instability.unstable
        ? `unstable (${round.instability.magnitude.toFixed(3)} > ${round.instability.threshold}), repaired ${round.instability.repairedFrames.length} frames`
        : "stable",
    ];
    if (round.perturbed) parts.push("perturbed");
    if (round.coherence) {
      parts.push(
        round.coherence.ok ? "coherent" : `violations: ${round.coherence.violations.join(", ")}`,
      );
    }
    if (round.resealed.length > 0) parts.push(`resealed: ${round.resealed.join(", ")}`);
    if (round.repaired.length > 0) parts.push(`sealed: ${round.repaired.join(", ")}`);
    lines.push(parts.join("; "));
  }
  lines.push(
    report.divergence.diverged
      ? `diverged: total ${report.divergence.total.toFixed(3)} > ${report.divergence.cutoff}`
      : `converged: total ${report.divergence.total.toFixed(3)}`,
  );
  lines.push(...report.frames, ...report.boundaries, ...report.nodes);
  lines.push(`events=${report.events.total} dropped=${report.events.dropped}`);
  return lines.join("\n");
}

export type FrameScenarioCliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
};

const defaultCliIo: FrameScenarioCliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
};

/**
 * Body of `cli/frame-scenario.ts`: load the manifest, run it, optionally
 * write the JSON report, then print the summary.
 */
export async function runFrameScenarioCli(
  argv: string[],
  io: FrameScenarioCliIo = defaultCliIo,
): Promise<TFrameScenarioReport> {
  const args = parseFrameScenarioArgs(argv);
  const env = resolveFrameEnv(io.env);
  const manifestPath = path.resolve(args.manifest ?? DEFAULT_MANIFEST_PATH);
  const manifest = await loadFrameScenarioManifest(manifestPath);
  const echo = env.logStdout && !args.quiet;

  const report = runFrameScenario(manifest, {
    manifest_path: manifestPath,
    eventCapacity: env.eventBufferSize,
    maxNestingDepth: env.maxNestingDepth,
    loggerFor: echo ? createConsoleLoggerFactory(io.stdout) : undefined,
  });

  if (args.out) {
    const outPath = path.resolve(args.out);
    await fs.writeFile(outPath, JSON.stringify(report, null, 2));
    io.stderr(`wrote report to ${outPath}`);
  }

  io.stdout(renderFrameScenarioSummary(report));
  return report;
}
