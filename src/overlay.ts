/**
 * Date overlay burned into the final video
 */
import { z } from 'zod';
import type { FilterUnit } from './types.js';
import { EnvFormatError } from './errors.js';

export const DEFAULT_FONTFILE = '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf';

const OverlayEnvSchema = z.object({
  // An empty value (`POST_DATE=` in .env) counts as unset
  POST_DATE: z.string().optional().transform((v) => v || undefined),
  OVERLAY_FONTFILE: z.string().optional().transform((v) => v || DEFAULT_FONTFILE),
});

export interface OverlayConfig {
  postDate: string;
  fontfile: string;
}

/**
 * Local date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = (date.getMonth() + 1).toString().padStart(2, '0');
  const d = date.getDate().toString().padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Read overlay settings from the environment (POST_DATE, OVERLAY_FONTFILE)
 */
export function getOverlayConfig(
  env: Record<string, unknown> = process.env,
  now: Date = new Date()
): OverlayConfig {
  const parsed = OverlayEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new EnvFormatError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return {
    postDate: parsed.data.POST_DATE ?? formatDate(now),
    fontfile: parsed.data.OVERLAY_FONTFILE,
  };
}

export function dateOverlay(overlay: OverlayConfig): FilterUnit {
  return {
    drawtext: {
      fontfile: overlay.fontfile,
      text: overlay.postDate,
      fontcolor: 'black',
      fontsize: '28',
      box: '1',
      boxcolor: 'white@0.8',
      boxborderw: '10',
      x: 'w-200',
      y: '15',
    },
  };
}
