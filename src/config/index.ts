import 'dotenv/config';
import { ZodError } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

export type { Config } from './validation.js';

type Env = Record<string, string | undefined>;

const toInt = (value: string | undefined): number | undefined =>
  value !== undefined && value !== '' ? parseInt(value, 10) : undefined;

const toFloat = (value: string | undefined): number | undefined =>
  value !== undefined && value !== '' ? parseFloat(value) : undefined;

const orUndefined = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Build the runtime configuration from environment variables.
 * Every value has a default, so an empty environment is valid.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: orUndefined(env['NODE_ENV']),
      logLevel: orUndefined(env['LOG_LEVEL']),
    },
    paths: {
      workDir: orUndefined(env['DOCSTRUCT_WORK_DIR']),
      storeDir: orUndefined(env['DOCSTRUCT_STORE_DIR']),
    },
    fusion: {
      bboxTolerance: toFloat(env['DOCSTRUCT_BBOX_TOLERANCE']),
      pageWidth: toInt(env['DOCSTRUCT_PAGE_WIDTH']),
      pageHeight: toInt(env['DOCSTRUCT_PAGE_HEIGHT']),
      cjkRatioThreshold: toFloat(env['DOCSTRUCT_CJK_RATIO']),
    },
    segmentation: {
      tocRowMaxLength: toInt(env['DOCSTRUCT_TOC_ROW_MAX_LENGTH']),
      leadingLabelMaxLength: toInt(env['DOCSTRUCT_LEADING_LABEL_MAX_LENGTH']),
    },
    batch: {
      concurrency: toInt(env['DOCSTRUCT_CONCURRENCY']),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
    }
    throw error;
  }
}

export const config = loadConfig();
