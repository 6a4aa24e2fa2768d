import { str, uint } from '../metadata/env-schema';
import { nameWithOwnerFromGitURL } from './git-url';
import type { ProviderDefinition } from './types';

export const jenkins: ProviderDefinition = {
  name: 'jenkins',
  commitVariable: 'GIT_COMMIT',
  detect: (env) => !!env.JENKINS_HOME,
  fields: [
    str('GIT_BRANCH'),
    str('GIT_COMMIT'),
    str('GIT_URL'),
    str('BUILD_URL', undefined, { required: true }),
    uint('EXECUTOR_NUMBER', ':jenkins_executor_number'),
    str('JOB_NAME', ':jenkins_job_name'),
    str('JOB_URL', ':jenkins_job_url'),
    str('NODE_NAME', ':jenkins_node_name'),
    str('WORKSPACE', ':jenkins_workspace'),
  ],
  derive(vars) {
    return {
      branch: vars.string('GIT_BRANCH'),
      buildURL: vars.string('BUILD_URL'),
      repoNameWithOwner: nameWithOwnerFromGitURL(vars.string('GIT_URL')),
    };
  },
};
