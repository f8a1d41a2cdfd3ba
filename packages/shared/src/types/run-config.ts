/**
 * Run configuration
 * Built once from command-line input and read-only for the rest of the run
 */

import { z } from 'zod';

export const DEFAULT_OUT_DIR = 'frames';
export const DEFAULT_FPS = 10;
export const DEFAULT_FRAME_PATTERN = 'frame_%06d.png';
export const DEFAULT_VIDEO_PATH = 'video.mp4';

// printf-style integer placeholder: %d, %6d, %06d
const NUMERIC_PLACEHOLDER = /%0?\d*d/;

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const runConfigSchema = z.object({
  url: z.string().trim().min(1, 'A video URL is required'),
  outDir: z.string().min(1).default(DEFAULT_OUT_DIR),
  // 0 is passed through to ffmpeg untouched
  fps: z.coerce
    .number({ invalid_type_error: 'fps must be a number' })
    .int('fps must be a whole number')
    .nonnegative('fps must not be negative')
    .default(DEFAULT_FPS),
  pattern: z
    .string()
    .default(DEFAULT_FRAME_PATTERN)
    .refine((value) => NUMERIC_PLACEHOLDER.test(value), {
      message: 'pattern must contain a numeric placeholder such as %06d',
    }),
  scale: optionalText,
  start: optionalText,
  duration: optionalText,
  keepVideo: z.boolean().default(false),
  videoPath: z.string().min(1).default(DEFAULT_VIDEO_PATH),
  fetchYtDlp: z.boolean().default(false),
});

export type RunConfigInput = z.input<typeof runConfigSchema>;
export type RunConfig = Readonly<z.output<typeof runConfigSchema>>;

/** External executables the pipeline drives */
export const TOOL_NAMES = {
  FFMPEG: 'ffmpeg',
  YT_DLP: 'yt-dlp',
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];
