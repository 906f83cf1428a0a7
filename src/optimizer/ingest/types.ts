/**
 * Profile Source Contract
 */

import type { CapabilityStatement, RawProfile, SourceName } from '../types';

/**
 * A capability statement before the ingester assigns its id
 */
export type StatementDraft = Omit<CapabilityStatement, 'id' | 'source'>;

export interface SourceContribution {
  statements: StatementDraft[];
  raw: RawProfile;
}

/**
 * One external profile source (code host, publication index, network profile)
 */
export interface ProfileSource {
  readonly name: SourceName;
  /** False when the identifier for this source was not configured */
  isConfigured(): boolean;
  collect(): Promise<SourceContribution>;
}
