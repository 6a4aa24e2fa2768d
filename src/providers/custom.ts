import { str } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

const required = { required: true };

/** Fallback for CI systems without built-in support */
export const custom: ProviderDefinition = {
  name: 'custom',
  commitVariable: 'GIT_COMMIT',
  detect: () => true,
  fields: [
    str('GIT_BRANCH', ':git_branch', required),
    str('GIT_COMMIT', ':git_commit', required),
    str('BUILD_URL', ':build_url', required),
    str('ORGANIZATION_NAME', ':organization_name', required),
    str('REPOSITORY_NAME', ':repository_name', required),
  ],
  derive(vars) {
    return {
      branch: vars.string('GIT_BRANCH'),
      buildURL: vars.string('BUILD_URL'),
      repoNameWithOwner: `${vars.string('ORGANIZATION_NAME')}/${vars.string('REPOSITORY_NAME')}`,
    };
  },
};
