/**
 * Configuration sources: each environment variable lists identifiers for one
 * registry, optionally bound to a category.
 */

import { Category, Registry } from '../domain/request';

export interface SourceDefinition {
  variable: string;
  registry: Registry;
  declaredCategory?: Category;
}

export const SOURCE_DEFINITIONS = [
  { variable: 'CIVITAI_CHECKPOINTS_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'checkpoints' },
  { variable: 'CIVITAI_LORAS_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'loras' },
  { variable: 'CIVITAI_VAES_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'vae' },
  { variable: 'CIVITAI_EMBEDDINGS_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'embeddings' },
  { variable: 'CIVITAI_CONTROLNETS_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'controlnet' },
  { variable: 'CIVITAI_UPSCALERS_TO_DOWNLOAD', registry: Registry.Marketplace, declaredCategory: 'upscale_models' },
  { variable: 'CIVITAI_MODELS_TO_DOWNLOAD', registry: Registry.Marketplace },
  { variable: 'HF_REPOS_TO_DOWNLOAD', registry: Registry.Hub, declaredCategory: 'hub_snapshot' },
] as const satisfies readonly SourceDefinition[];

export type SourceVariable = (typeof SOURCE_DEFINITIONS)[number]['variable'];

/** Raw, unparsed values keyed by source variable. Unset sources are absent. */
export type SourceValues = Partial<Record<SourceVariable, string>>;

/** Pick the source variables out of an environment map. */
export function readSourceValues(env: Record<string, string | undefined>): SourceValues {
  const values: SourceValues = {};
  for (const def of SOURCE_DEFINITIONS) {
    const raw = env[def.variable];
    if (raw !== undefined) values[def.variable] = raw;
  }
  return values;
}
