import { str } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

const optional = { omitEmpty: true };

export const azurePipelines: ProviderDefinition = {
  name: 'azure-pipelines',
  commitVariable: 'BUILD_SOURCEVERSION',
  detect: (env) => !!env.BUILD_BUILDID,
  fields: [
    str('BUILD_BUILDID', ':build_buildid', optional),
    str('BUILD_BUILDNUMBER', ':build_buildnumber', optional),
    str('BUILD_BUILDURI', ':build_builduri'),
    str('BUILD_BINARIESDIRECTORY', ':build_binariesdirectory', optional),
    str('BUILD_CONTAINERID', ':build_containerid', optional),
    str('BUILD_DEFINITIONNAME', ':build_definitionname', optional),
    str('BUILD_DEFINITIONVERSION', ':build_definitionversion', optional),
    str('BUILD_QUEUEDBY', ':build_queuedby', optional),
    str('BUILD_QUEUEDBYID', ':build_queuedbyid', optional),
    str('BUILD_REASON', ':build_reason', optional),
    str('BUILD_REPOSITORY_CLEAN', ':build_repository_clean', optional),
    str('BUILD_REPOSITORY_LOCALPATH', ':build_repository_localpath', optional),
    str('BUILD_REPOSITORY_ID', ':build_repository_id', optional),
    str('BUILD_REPOSITORY_NAME', ':build_repository_name'),
    str('BUILD_REPOSITORY_PROVIDER', ':build_repository_provider', optional),
    str('BUILD_REPOSITORY_TFVC_WORKSPACE', ':build_repository_tfvc_workspace', optional),
    str('BUILD_REPOSITORY_URI', ':build_repository_uri', optional),
    str('BUILD_REQUESTEDFOREMAIL', ':build_requestedforemail', optional),
    str('BUILD_REQUESTEDFORID', ':build_requestedforid', optional),
    str('BUILD_SOURCEBRANCH', ':build_sourcebranch', optional),
    str('BUILD_SOURCEBRANCHNAME', ':build_sourcebranchname'),
    str('BUILD_SOURCESDIRECTORY', ':build_sourcesdirectory', optional),
    str('BUILD_SOURCEVERSION', ':build_sourceversion'),
    str('BUILD_SOURCEVERSIONMESSAGE', ':build_sourceversionmessage', optional),
    str('BUILD_STAGINGDIRECTORY', ':build_stagingdirectory', optional),
    str('BUILD_REPOSITORY_GIT_SUBMODULECHECKOUT', ':build_repository_git_submodulecheckout', optional),
    str('BUILD_SOURCETFVCSHELVESET', ':build_sourcetfvcshelveset', optional),
    str('SYSTEM_TEAMFOUNDATIONCOLLECTIONURI', ':system_teamfoundationcollectionuri'),
    str('BUILD_TRIGGEREDBY_BUILDID', ':build_triggeredby_buildid', optional),
    str('BUILD_TRIGGEREDBY_DEFINITIONID', ':build_triggeredby_definitionid', optional),
    str('BUILD_TRIGGEREDBY_DEFINITIONNAME', ':build_triggeredby_definitionname', optional),
    str('BUILD_TRIGGEREDBY_BUILDNUMBER', ':build_triggeredby_buildnumber', optional),
    str('BUILD_TRIGGEREDBY_PROJECTID', ':build_triggeredby_projectid', optional),
  ],
  derive(vars) {
    const repositoryName = vars.string('BUILD_REPOSITORY_NAME');
    // GitHub-hosted repositories are already "owner/repo"
    const repoNameWithOwner = repositoryName.includes('/')
      ? repositoryName
      : `${vars.string('SYSTEM_TEAMFOUNDATIONCOLLECTIONURI')}/${repositoryName}`;

    return {
      branch: vars.string('BUILD_SOURCEBRANCHNAME'),
      buildURL: vars.string('BUILD_BUILDURI'),
      repoNameWithOwner,
    };
  },
};
