import { z } from 'zod';

export const HoldbackConfig = z.object({
  /** Explicit registry source directories; when empty they are located in the depots */
  registries: z.array(z.string().min(1)).default([]),
  /** Depot directories searched for `registries/*` */
  depotPaths: z.array(z.string().min(1)).min(1),
  /** Runtime stdlib directory; the bundled name list is used when unset */
  stdlibDir: z.string().min(1).optional(),
  /** Source-host API token, only needed for package discovery */
  hostToken: z.string().min(1).optional(),
});

export type HoldbackConfig = z.infer<typeof HoldbackConfig>;
