import { z } from 'zod';
import { DEFAULT_BBOX_TOLERANCE, DEFAULT_CJK_RATIO_THRESHOLD, DEFAULT_PAGE_SIZE } from '../utils/constants.js';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  paths: z.object({
    workDir: z.string().min(1).default('./files/work'),
    storeDir: z.string().min(1).default('./files/json_store'),
  }),
  fusion: z.object({
    bboxTolerance: z.number().positive().default(DEFAULT_BBOX_TOLERANCE),
    pageWidth: z.number().int().positive().default(DEFAULT_PAGE_SIZE[0]),
    pageHeight: z.number().int().positive().default(DEFAULT_PAGE_SIZE[1]),
    cjkRatioThreshold: z.number().min(0).max(1).default(DEFAULT_CJK_RATIO_THRESHOLD),
  }),
  segmentation: z.object({
    tocRowMaxLength: z.number().int().positive().default(50),
    leadingLabelMaxLength: z.number().int().positive().default(100),
  }),
  batch: z.object({
    concurrency: z.number().int().positive().default(4),
  }),
});

export type Config = z.infer<typeof configSchema>;
