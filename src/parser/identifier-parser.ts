/**
 * Identifier parser: configuration values to a flat work list.
 *
 * Values are comma-separated; surrounding whitespace and empty elements are
 * ignored. Duplicates are kept: each one is an independent request.
 */

import { AcquisitionRequest } from '../domain/request';
import { SOURCE_DEFINITIONS, SourceDefinition, SourceValues } from './sources';

/** Split one raw list value. */
export function splitIdentifiers(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Build the work list in source-definition order, then list order. */
export function parseWorkList(
  values: SourceValues | Readonly<Record<string, string | undefined>>,
  definitions: readonly SourceDefinition[] = SOURCE_DEFINITIONS,
): AcquisitionRequest[] {
  const requests: AcquisitionRequest[] = [];
  for (const def of definitions) {
    const lookup: Readonly<Record<string, string | undefined>> = values;
    for (const identifier of splitIdentifiers(lookup[def.variable])) {
      requests.push(
        Object.freeze({
          registry: def.registry,
          identifier,
          declaredCategory: def.declaredCategory,
          source: def.variable,
        }),
      );
    }
  }
  return requests;
}

const MARKETPLACE_ID = /^(\d+)(?:@(\d+))?$/;

export interface MarketplaceIdentifier {
  modelId: string;
  versionId?: string;
}

/** `123` or `123@456` (model pinned to a version). Returns null when invalid. */
export function parseMarketplaceIdentifier(identifier: string): MarketplaceIdentifier | null {
  const match = MARKETPLACE_ID.exec(identifier);
  if (!match) return null;
  return match[2] ? { modelId: match[1], versionId: match[2] } : { modelId: match[1] };
}

export const DEFAULT_REVISION = 'main';

const HUB_REPO = /^([A-Za-z0-9][\w.-]*)\/([A-Za-z0-9][\w.-]*)(?:@([\w.\/-]+))?$/;

export interface HubIdentifier {
  owner: string;
  name: string;
  revision: string;
}

/** `owner/name` or `owner/name@revision` (default revision `main`). Returns null when invalid. */
export function parseHubIdentifier(identifier: string): HubIdentifier | null {
  const match = HUB_REPO.exec(identifier);
  if (!match) return null;
  return { owner: match[1], name: match[2], revision: match[3] ?? DEFAULT_REVISION };
}
