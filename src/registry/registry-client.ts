/**
 * Registry client contract.
 *
 * A client turns one request into a ResolvedArtifact or rejects with an
 * AcquisitionError (RESOLVE.* or AUTH.*). Resolution never retries; retrying
 * bytes is the transfer engine's job.
 */

import { ResolvedArtifact } from '../domain/artifact';
import { AcquisitionRequest, Registry } from '../domain/request';

/** Outcome of a lightweight credential probe. */
export type CredentialStatus = 'valid' | 'invalid' | 'absent' | 'unreachable';

export interface CredentialCheck {
  registry: Registry;
  status: CredentialStatus;
  statusCode?: number;
}

export interface RegistryClient {
  readonly registry: Registry;
  resolve(request: AcquisitionRequest, signal?: AbortSignal): Promise<ResolvedArtifact>;
  /** Non-fatal probe of the configured credential. */
  checkCredential(signal?: AbortSignal): Promise<CredentialCheck>;
}
