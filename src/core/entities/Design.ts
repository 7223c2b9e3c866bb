import { z } from 'zod';

/**
 * Read-only design data supplied by the host application for one request.
 * Every field is optional so an empty project still validates.
 */
export const ComponentSchema = z.object({
  reference: z.string().min(1),
  value: z.string().default(''),
  footprint: z.string().default(''),
  position_mm: z.tuple([z.number(), z.number()]).optional(),
  rotation_deg: z.number().optional(),
  layer: z.enum(['top', 'bottom']).optional(),
  pad_count: z.number().int().nonnegative().optional(),
});

export const NetSchema = z.object({
  code: z.number().int().nonnegative(),
  name: z.string(),
});

export const DesignSnapshotSchema = z.object({
  title: z.string().optional(),
  kind: z.enum(['pcb', 'schematic']).default('pcb'),
  components: z.array(ComponentSchema).default([]),
  nets: z.array(NetSchema).default([]),
  board: z
    .object({
      width_mm: z.number().nonnegative(),
      height_mm: z.number().nonnegative(),
      copper_layers: z.number().int().positive().optional(),
      track_count: z.number().int().nonnegative().optional(),
    })
    .optional(),
  sheet: z
    .object({
      sheet_count: z.number().int().positive(),
      paper_size: z.string().optional(),
    })
    .optional(),
});

export type DesignComponent = z.infer<typeof ComponentSchema>;
export type DesignNet = z.infer<typeof NetSchema>;
export type DesignSnapshot = z.infer<typeof DesignSnapshotSchema>;

export function isEmptySnapshot(snapshot: DesignSnapshot | undefined): boolean {
  if (!snapshot) return true;
  return (
    snapshot.components.length === 0 &&
    snapshot.nets.length === 0 &&
    !snapshot.board &&
    !snapshot.sheet
  );
}
