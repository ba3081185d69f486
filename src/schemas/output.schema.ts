import { z } from 'zod';

export const HeldBackEntry = z.object({
  name: z.string().min(1),
  lastVersion: z.string().min(1),
  compat: z.string().min(1),
});

export type HeldBackEntry = z.infer<typeof HeldBackEntry>;

export const HolderReport = z.object({
  name: z.string().min(1),
  heldBack: z.array(HeldBackEntry).min(1),
});

export type HolderReport = z.infer<typeof HolderReport>;

/**
 * JSON form of a HoldMap. Holders are sorted by name; each holder's list
 * keeps its original order.
 */
export const HeldBackReport = z.object({
  holders: z.array(HolderReport),
});

export type HeldBackReport = z.infer<typeof HeldBackReport>;

export const HeldByReport = z.object({
  package: z.string().min(1),
  version: z.string().optional(),
  heldBy: z.array(z.string()),
});

export type HeldByReport = z.infer<typeof HeldByReport>;
