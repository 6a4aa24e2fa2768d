import type { Env } from '../types';
import { parseEnv, serializableFields } from '../metadata/env-schema';
import type { Logger } from '../utils/logger';
import { awsCodeBuild } from './aws-codebuild';
import { azurePipelines } from './azure-pipelines';
import { bitbucket } from './bitbucket';
import { buildkite } from './buildkite';
import { circleci } from './circleci';
import { custom } from './custom';
import { githubActions } from './github-actions';
import { jenkins } from './jenkins';
import { semaphore } from './semaphore';
import { travisCI } from './travis-ci';
import { webappIO } from './webapp-io';
import type { ProviderDefinition, ProviderMetadata } from './types';

export type { ProviderDefinition, ProviderMetadata, ProviderName, ProviderDerivation } from './types';
export { nameWithOwnerFromGitURL, parsePullRequestNumber } from './git-url';

/** Known providers, most specific first; the first match wins */
export const DETECTION_ORDER: readonly ProviderDefinition[] = [
  buildkite,
  circleci,
  githubActions,
  jenkins,
  semaphore,
  travisCI,
  webappIO,
  awsCodeBuild,
  bitbucket,
  azurePipelines,
];

/** Pick the provider for this environment, falling back to custom */
export function detectProvider(env: Env): ProviderDefinition {
  return DETECTION_ORDER.find((provider) => provider.detect(env)) ?? custom;
}

/**
 * Parse the provider's variables and compute its derived values.
 * Throws EnvValidationError for missing or malformed variables and
 * MalformedURLError when a remote URL can't be read.
 */
export function initProvider(provider: ProviderDefinition, env: Env, logger: Logger): ProviderMetadata {
  const vars = parseEnv(provider.fields, env);
  const commitSHA = vars.string(provider.commitVariable);
  logger.log(`Using $${provider.commitVariable} environment variable as commit SHA: ${commitSHA}`);

  const derivation = provider.derive(vars, logger);

  return {
    name: provider.name,
    branch: derivation.branch,
    buildURL: derivation.buildURL,
    commitSHA,
    repoNameWithOwner: derivation.repoNameWithOwner,
    fields: serializableFields(provider.fields, vars, derivation.derivedFields),
  };
}

/** Detect the provider, log it, and extract its metadata */
export function providerMetadataFromEnv(env: Env, logger: Logger): ProviderMetadata {
  const provider = detectProvider(env);
  logger.log(`Detected build environment: ${provider.name}`);
  return initProvider(provider, env, logger);
}
