import { z } from 'zod';
import { DEFAULT_REMOTE_MODEL } from '../claude/model-router';
import { DEFAULT_HEADING_OPTIONS, type HeadingExtractionOptions } from '../guidelines/heading-extractor';
import { DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL, type JsonFormatSetting } from '../ollama/ollama-gateway';

const commaList = z.string().transform(value =>
  value.split(',').map(part => part.trim()).filter(Boolean),
);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  REMOTE_MODEL: z.string().min(1).default(DEFAULT_REMOTE_MODEL),

  OLLAMA_BASE_URL: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  OLLAMA_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  OLLAMA_JSON_FORMAT: z.enum(['auto', 'on', 'off']).default('auto'),

  HEADING_BOLD_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_HEADING_OPTIONS.boldThreshold),
  HEADING_HEADER_FRAC: z.coerce.number().min(0).max(1).default(DEFAULT_HEADING_OPTIONS.headerFrac),
  HEADING_FOOTER_FRAC: z.coerce.number().min(0).max(1).default(DEFAULT_HEADING_OPTIONS.footerFrac),
  HEADING_MIN_LEN: z.coerce.number().int().nonnegative().default(DEFAULT_HEADING_OPTIONS.minLength),
  HEADING_MAX_LEN: z.coerce.number().int().positive().default(DEFAULT_HEADING_OPTIONS.maxLength),
  HEADING_MAX_LEVELS: z.coerce.number().int().positive().default(DEFAULT_HEADING_OPTIONS.maxLevels),
  HEADING_BOLD_MARKERS: commaList.optional(),
  HEADING_SEPARATION: z.enum(['filter', 'annotate']).default(DEFAULT_HEADING_OPTIONS.separationPolicy),
  HEADING_LEVEL_BAND_GAP: z.coerce.number().nonnegative().default(DEFAULT_HEADING_OPTIONS.levelBandGap),
  HEADING_LEVEL_MATCH_TOLERANCE: z.coerce.number().nonnegative().default(DEFAULT_HEADING_OPTIONS.levelMatchTolerance),

  SECTION_TARGET_LEVEL: z.coerce.number().int().positive().default(2),
  AUDIT_MAX_SECTION_CHARS: z.coerce.number().int().nonnegative().default(2000),
});

export interface PipelineConfig {
  anthropicApiKey?: string;
  remoteModel: string;
  ollama: {
    baseUrl: string;
    model: string;
    timeoutMs: number;
    jsonFormat: JsonFormatSetting;
  };
  headings: HeadingExtractionOptions;
  sectionTargetLevel: number;
  /** 0 disables truncation */
  maxSectionChars: number;
}

/**
 * Build the pipeline configuration from environment variables. Unset values
 * fall back to defaults; malformed values throw with every offending key.
 */
export function loadPipelineConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }
  const parsed = result.data;

  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    remoteModel: parsed.REMOTE_MODEL,
    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL,
      model: parsed.OLLAMA_MODEL,
      timeoutMs: parsed.OLLAMA_TIMEOUT_MS,
      jsonFormat: parsed.OLLAMA_JSON_FORMAT,
    },
    headings: {
      ...DEFAULT_HEADING_OPTIONS,
      boldThreshold: parsed.HEADING_BOLD_THRESHOLD,
      headerFrac: parsed.HEADING_HEADER_FRAC,
      footerFrac: parsed.HEADING_FOOTER_FRAC,
      minLength: parsed.HEADING_MIN_LEN,
      maxLength: parsed.HEADING_MAX_LEN,
      maxLevels: parsed.HEADING_MAX_LEVELS,
      boldMarkers: parsed.HEADING_BOLD_MARKERS && parsed.HEADING_BOLD_MARKERS.length > 0
        ? parsed.HEADING_BOLD_MARKERS
        : DEFAULT_HEADING_OPTIONS.boldMarkers,
      separationPolicy: parsed.HEADING_SEPARATION,
      levelBandGap: parsed.HEADING_LEVEL_BAND_GAP,
      levelMatchTolerance: parsed.HEADING_LEVEL_MATCH_TOLERANCE,
    },
    sectionTargetLevel: parsed.SECTION_TARGET_LEVEL,
    maxSectionChars: parsed.AUDIT_MAX_SECTION_CHARS,
  };
}
