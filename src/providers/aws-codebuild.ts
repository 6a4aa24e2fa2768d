import { str, uint } from '../metadata/env-schema';
import { describeError } from '../errors';
import type { Logger } from '../utils/logger';
import type { ProviderDefinition } from './types';

/**
 * Owner and repository from a public build URL's path, e.g.
 * https://host/some-owner/some-repo.git/... yields "some-owner/some-repo".
 * Returns '' when the URL doesn't parse or its path is too short.
 */
export function codeBuildNameWithOwner(publicBuildURL: string, logger: Logger): string {
  let pathname: string;
  try {
    pathname = new URL(publicBuildURL).pathname;
  } catch (err) {
    logger.log(`Unable to determine repository from build URL "${publicBuildURL}": ${describeError(err)}`);
    return '';
  }

  const segments = pathname.split('/');
  if (segments.length < 3 || !segments[1] || !segments[2]) {
    logger.log(`Unable to determine repository from build URL "${publicBuildURL}": path has too few segments`);
    return '';
  }

  return `${segments[1]}/${segments[2].replace(/\.git$/, '')}`;
}

export const awsCodeBuild: ProviderDefinition = {
  name: 'aws-codebuild',
  commitVariable: 'CODEBUILD_RESOLVED_SOURCE_VERSION',
  detect: (env) => !!env.CODEBUILD_BUILD_ID,
  fields: [
    str('AWS_DEFAULT_REGION', ':aws_default_region', { omitEmpty: true }),
    str('AWS_REGION', ':aws_region', { omitEmpty: true }),
    str('CODEBUILD_BATCH_BUILD_IDENTIFIER', ':codebuild_batch_build_identifier', { omitEmpty: true }),
    str('CODEBUILD_BUILD_ARN', ':codebuild_build_arn', { omitEmpty: true }),
    str('CODEBUILD_BUILD_ID', ':codebuild_build_id', { omitEmpty: true }),
    str('CODEBUILD_BUILD_IMAGE', ':codebuild_build_image', { omitEmpty: true }),
    uint('CODEBUILD_BUILD_NUMBER', ':codebuild_build_number', { omitEmpty: true }),
    uint('CODEBUILD_BUILD_SUCCEEDING', ':codebuild_build_succeeding', { omitEmpty: true }),
    str('CODEBUILD_INITIATOR', ':codebuild_initiator', { omitEmpty: true }),
    str('CODEBUILD_KMS_KEY_ID', ':codebuild_kms_key_id', { omitEmpty: true }),
    str('CODEBUILD_LOG_PATH', ':codebuild_log_path', { omitEmpty: true }),
    str('CODEBUILD_PUBLIC_BUILD_URL', ':codebuild_public_build_url'),
    str('CODEBUILD_RESOLVED_SOURCE_VERSION', ':codebuild_resolved_source_version'),
    str('CODEBUILD_SOURCE_REPO_URL', ':codebuild_source_repo_url', { omitEmpty: true }),
    str('CODEBUILD_SOURCE_VERSION', ':codebuild_source_version'),
    str('CODEBUILD_SRC_DIR', ':codebuild_src_dir', { omitEmpty: true }),
    str('CODEBUILD_START_TIME', ':codebuild_start_time', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_ACTOR_ACCOUNT_ID', ':codebuild_webhook_actor_account_id', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_BASE_REF', ':codebuild_webhook_base_ref', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_EVENT', ':codebuild_webhook_event', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_MERGE_COMMIT', ':codebuild_webhook_merge_commit', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_PREV_COMMIT', ':codebuild_webhook_prev_commit', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_HEAD_REF', ':codebuild_webhook_head_ref', { omitEmpty: true }),
    str('CODEBUILD_WEBHOOK_TRIGGER', ':codebuild_webhook_trigger', { omitEmpty: true }),
  ],
  derive(vars, logger) {
    const buildURL = vars.string('CODEBUILD_PUBLIC_BUILD_URL');

    return {
      branch: vars.string('CODEBUILD_SOURCE_VERSION'),
      buildURL,
      repoNameWithOwner: codeBuildNameWithOwner(buildURL, logger),
    };
  },
};
