export type TokenEncodingName = 'cl100k_base' | 'o200k_base';

export interface ModelCapabilities {
  readonly supportsTemperature: boolean;
  /** Unset for models whose tokenizer is unknown; counts fall back to an approximation. */
  readonly encoding?: TokenEncodingName;
}

const MODEL_CAPABILITIES: Readonly<Record<string, ModelCapabilities>> = {
  'gpt-3.5': { supportsTemperature: true, encoding: 'cl100k_base' },
  'gpt-4': { supportsTemperature: true, encoding: 'cl100k_base' },
  'gpt-4o': { supportsTemperature: true, encoding: 'o200k_base' },
  'gpt-4.1': { supportsTemperature: true, encoding: 'o200k_base' },
  'gpt-5': { supportsTemperature: false, encoding: 'o200k_base' },
  o1: { supportsTemperature: false, encoding: 'o200k_base' },
  o3: { supportsTemperature: false, encoding: 'o200k_base' },
  o4: { supportsTemperature: false, encoding: 'o200k_base' },
};

const UNKNOWN_MODEL: ModelCapabilities = { supportsTemperature: true };

/** Longest matching prefix wins, so `gpt-4o-mini` resolves to `gpt-4o`, not `gpt-4`. */
export function resolveModelCapabilities(model: string): ModelCapabilities {
  const normalized = model.trim().toLowerCase();
  let bestPrefix = '';
  let best = UNKNOWN_MODEL;

  for (const [prefix, capabilities] of Object.entries(MODEL_CAPABILITIES)) {
    if (normalized.startsWith(prefix) && prefix.length > bestPrefix.length) {
      bestPrefix = prefix;
      best = capabilities;
    }
  }

  return best;
}
