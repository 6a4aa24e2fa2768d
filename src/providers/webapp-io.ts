import { str, uint } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

export const webappIO: ProviderDefinition = {
  name: 'webapp.io',
  commitVariable: 'GIT_COMMIT',
  detect: (env) => env.WEBAPPIO === 'true',
  fields: [
    str('GIT_BRANCH'),
    str('GIT_COMMIT'),
    uint('JOB_ID'),
    str('PULL_REQUEST_URL', ':pull_request_url', { omitEmpty: true }),
    str('ORGANIZATION_NAME'),
    str('REPOSITORY_NAME'),
    str('REPOSITORY_OWNER'),
    uint('RETRY_INDEX', ':retry_index'),
    str('RUNNER_ID'),
  ],
  derive(vars) {
    const buildURL = [
      'https://webapp.io',
      vars.string('ORGANIZATION_NAME'),
      vars.string('REPOSITORY_NAME'),
      vars.uint('JOB_ID'),
      `${vars.string('RUNNER_ID')}-${vars.uint('RETRY_INDEX')}`,
    ].join('/');

    return {
      branch: vars.string('GIT_BRANCH'),
      buildURL,
      repoNameWithOwner: `${vars.string('REPOSITORY_OWNER')}/${vars.string('REPOSITORY_NAME')}`,
    };
  },
};
