/**
 * Marketplace model type → category directory.
 */

import { Category } from '../domain/request';

const TYPE_CATEGORIES: Record<string, Category> = {
  checkpoint: 'checkpoints',
  lora: 'loras',
  locon: 'loras',
  lycoris: 'loras',
  dora: 'loras',
  vae: 'vae',
  textualinversion: 'embeddings',
  controlnet: 'controlnet',
  upscaler: 'upscale_models',
};

/** Category for a marketplace type name (case-insensitive), or undefined if unrecognised. */
export function categoryForModelType(modelType: string): Category | undefined {
  return TYPE_CATEGORIES[modelType.trim().toLowerCase()];
}
