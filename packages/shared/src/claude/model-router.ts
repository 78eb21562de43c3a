export const MODELS = {
  haiku: 'claude-haiku-4-5-20251001',
  sonnet: 'claude-sonnet-4-5-20250929',
  opus: 'claude-opus-4-1-20250805',
} as const;

export type ModelTier = keyof typeof MODELS;

export const DEFAULT_REMOTE_MODEL: ModelTier = 'sonnet';

const isModelTier = (key: string): key is ModelTier => Object.prototype.hasOwnProperty.call(MODELS, key);

/**
 * Resolve a preset key ("sonnet") to its full model id. Anything that is not
 * a known preset is assumed to already be a model id and passes through.
 */
export function resolveModel(keyOrId: string): string {
  const key = keyOrId.trim();
  return isModelTier(key) ? MODELS[key] : key;
}
