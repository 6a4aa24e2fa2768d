import type { Env, FieldValue } from '../types';
import type { EnvField, ParsedEnv, SerializableFields } from '../metadata/env-schema';
import type { Logger } from '../utils/logger';

export type ProviderName =
  | 'buildkite'
  | 'circleci'
  | 'github-actions'
  | 'jenkins'
  | 'semaphore'
  | 'travis-ci'
  | 'webapp.io'
  | 'aws-codebuild'
  | 'bitbucket.org'
  | 'azure-pipelines'
  | 'custom';

/** Values a provider computes from its parsed variables */
export interface ProviderDerivation {
  branch: string;
  buildURL: string;
  repoNameWithOwner: string;
  /** Values for the table's derived fields, keyed by output key */
  derivedFields?: Readonly<Record<string, FieldValue>>;
}

/**
 * Everything the reporter knows about one CI provider: how to recognize it,
 * which variables it sets, and how to turn them into build metadata.
 */
export interface ProviderDefinition {
  name: ProviderName;
  /** Variable holding the SHA of the commit under test */
  commitVariable: string;
  fields: readonly EnvField[];
  detect(env: Env): boolean;
  derive(vars: ParsedEnv, logger: Logger): ProviderDerivation;
}

/** Metadata extracted for the provider that ran this build */
export interface ProviderMetadata {
  readonly name: ProviderName;
  readonly branch: string;
  readonly buildURL: string;
  readonly commitSHA: string;
  readonly repoNameWithOwner: string;
  /** Provider-specific output fields, in document order */
  readonly fields: SerializableFields;
}
