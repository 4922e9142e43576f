import { z } from "zod";

/**
 * Frame scenario manifest: a scripted growth/perturb/validate loop over a
 * reference-frame graph. Every field has a default so `{}` is a valid run.
 */

export const FrameScenarioRound = z.object({
  add_nodes: z.number().int().nonnegative(),
  perturb: z.boolean().default(false),
  validate: z.boolean().default(false),
});

export type TFrameScenarioRound = z.infer<typeof FrameScenarioRound>;

export const FrameScenarioManifest = z.object({
  name: z.string().trim().min(1).default("frame-scenario"),
  seed_states: z.tuple([z.number(), z.number()]).default([0.0, 0.05]),
  initial_scale: z.number().positive().default(1),
  sub_frame_scale: z.number().positive().default(0.5),
  boundary_coherence: z.number().default(1),
  growth_state_step: z.number().default(0.05),
  instability_threshold: z.number().nonnegative().default(1),
  perturb_amount: z.number().default(0.4),
  rounds: z
    .array(FrameScenarioRound)
    .default([
      { add_nodes: 1, perturb: false, validate: false },
      { add_nodes: 2, perturb: true, validate: true },
      { add_nodes: 3, perturb: false, validate: true },
    ]),
});

export type TFrameScenarioManifest = z.infer<typeof FrameScenarioManifest>;
export type TFrameScenarioManifestInput = z.input<typeof FrameScenarioManifest>;

export const FrameGraphCountsSchema = z.object({
  nodes: z.number().int().nonnegative(),
  frames: z.number().int().nonnegative(),
  topLevelFrames: z.number().int().nonnegative(),
  boundaries: z.number().int().nonnegative(),
  peerLinks: z.number().int().nonnegative(),
  nestingEdges: z.number().int().nonnegative(),
});

export const FrameScenarioRoundResult = z.object({
  round: z.number().int().nonnegative(),
  added_nodes: z.array(z.string()),
  instability: z.object({
    unstable: z.boolean(),
    magnitude: z.number(),
    threshold: z.number(),
    repairedFrames: z.array(z.string()),
  }),
  perturbed: z.boolean(),
  coherence: z
    .object({
      ok: z.boolean(),
      violations: z.array(z.string()),
    })
    .optional(),
  resealed: z.array(z.string()),
  repaired: z.array(z.string()),
});

export type TFrameScenarioRoundResult = z.infer<typeof FrameScenarioRoundResult>;

export const FrameScenarioReport = z.object({
  schema_version: z.literal("frame_scenario_report/1"),
  kind: z.literal("frame_scenario_report"),
  name: z.string(),
  generated_at_iso: z.string(),
  manifest_path: z.string().optional(),
  rounds: z.array(FrameScenarioRoundResult),
  divergence: z.object({
    diverged: z.boolean(),
    total: z.number(),
    cutoff: z.number(),
  }),
  counts: FrameGraphCountsSchema,
  nodes: z.array(z.string()),
  frames: z.array(z.string()),
  boundaries: z.array(z.string()),
  events: z.object({
    total: z.number().int().nonnegative(),
    dropped: z.number().int().nonnegative(),
  }),
  report_hash: z.string(),
});

export type TFrameScenarioReport = z.infer<typeof FrameScenarioReport>;
