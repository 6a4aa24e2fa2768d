import { derived, str, uint } from '../metadata/env-schema';
import type { ParsedEnv } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

const DEFAULT_SERVER_URL = 'https://github.com';
const BRANCH_REF_PREFIX = 'refs/heads/';

/**
 * Branch under test.
 *
 * For pull_request events GITHUB_REF is the merge ref (refs/pull/N/merge), so
 * the topic branch comes from GITHUB_HEAD_REF, forks included. For other
 * events only branch refs name a branch; tags and anything else yield ''.
 */
export function githubBranch(vars: ParsedEnv): string {
  if (vars.string('GITHUB_EVENT_NAME') === 'pull_request') {
    return vars.string('GITHUB_HEAD_REF');
  }

  const ref = vars.string('GITHUB_REF');
  if (ref.startsWith(BRANCH_REF_PREFIX)) {
    return ref.slice(BRANCH_REF_PREFIX.length);
  }

  return '';
}

export const githubActions: ProviderDefinition = {
  name: 'github-actions',
  commitVariable: 'GITHUB_SHA',
  detect: (env) => env.GITHUB_ACTIONS === 'true',
  fields: [
    str('GITHUB_ACTOR', ':github_actor'),
    str('GITHUB_BASE_REF', ':github_base_ref'),
    str('GITHUB_EVENT_NAME', ':github_event_name'),
    str('GITHUB_HEAD_REF', ':github_head_ref'),
    str('GITHUB_REF', ':github_ref'),
    str('GITHUB_REPOSITORY'),
    derived(':github_repo_url', 'string'),
    uint('GITHUB_RUN_ATTEMPT', ':github_run_attempt'),
    uint('GITHUB_RUN_ID', ':github_run_id'),
    uint('GITHUB_RUN_NUMBER', ':github_run_number'),
    str('GITHUB_SERVER_URL'),
    str('GITHUB_SHA'),
    str('GITHUB_WORKFLOW', ':github_workflow'),
  ],
  derive(vars) {
    const serverURL = vars.string('GITHUB_SERVER_URL') || DEFAULT_SERVER_URL;
    const repoURL = `${serverURL}/${vars.string('GITHUB_REPOSITORY')}`;
    const runID = vars.uint('GITHUB_RUN_ID');
    const attempt = vars.uint('GITHUB_RUN_ATTEMPT');

    return {
      branch: githubBranch(vars),
      buildURL: `${repoURL}/actions/runs/${runID}/attempts/${attempt}`,
      repoNameWithOwner: vars.string('GITHUB_REPOSITORY'),
      derivedFields: { ':github_repo_url': repoURL },
    };
  },
};
