/**
 * Acquisition requests: one per configured identifier.
 */

/** Source registry of a request. */
export enum Registry {
  /** Community marketplace keyed by numeric model/version identifiers. */
  Marketplace = 'marketplace',
  /** Hosted-model hub keyed by repository names. */
  Hub = 'hub',
}

/** Category directories under the storage root. */
export const CATEGORIES = [
  'checkpoints',
  'loras',
  'vae',
  'embeddings',
  'controlnet',
  'upscale_models',
  'diffusers',
  'hub_snapshot',
  'other',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** A single unit of work. Immutable once parsed. */
export interface AcquisitionRequest {
  readonly registry: Registry;
  readonly identifier: string;
  /** Category implied by the configuration source; undefined means "unknown". */
  readonly declaredCategory?: Category;
  /** Name of the configuration source the identifier came from. */
  readonly source: string;
}

/** Stable key used for per-identifier serialisation and staging directory names. */
export function requestKey(request: AcquisitionRequest): string {
  return `${request.registry}:${request.identifier}`;
}
