import { stringify } from 'yaml';
import type { FieldValue, Timestamp } from '../types';
import { SerializationError, describeError } from '../errors';
import { formatTimestamp } from '../utils/formatters';
import type { Metadata } from './metadata';

// Nested blocks (tag lists, multi-line messages) are indented four spaces
const STRINGIFY_OPTIONS = { indent: 4, lineWidth: 0 };

type DocumentValue = FieldValue | string[];
type Document = Record<string, DocumentValue | undefined>;

function timestamp(value: Timestamp | undefined): string | undefined {
  return value === undefined ? undefined : formatTimestamp(value);
}

/** Empty strings and lists become undefined so the key is left out */
function omitEmpty<T extends string | string[]>(value: T | undefined): T | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}

function compact(document: Document): Record<string, DocumentValue> {
  const out: Record<string, DocumentValue> = {};
  for (const [key, value] of Object.entries(document)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function universalFields(metadata: Metadata): Record<string, DocumentValue> {
  return compact({
    ':authored_at': timestamp(metadata.authoredAt),
    ':author_email': omitEmpty(metadata.authorEmail),
    ':author_name': omitEmpty(metadata.authorName),
    ':branch': metadata.branch,
    ':build_url': metadata.buildURL,
    ':check': metadata.check,
    ':ci_provider': metadata.ciProvider,
    ':commit_message': omitEmpty(metadata.commitMessage),
    ':commit_metadata_source': metadata.commitMetadataSource,
    ':commit': metadata.commitSHA,
    ':committed_at': timestamp(metadata.committedAt),
    ':committer_email': omitEmpty(metadata.committerEmail),
    ':committer_name': omitEmpty(metadata.committerName),
    ':quota_id': omitEmpty(metadata.quotaID),
    ':repo_name_with_owner': metadata.repoNameWithOwner,
    ':reporter_os': metadata.reporterOS,
    ':reporter_version': metadata.reporterVersion,
    ':tags': omitEmpty(metadata.tags),
    ':timestamp': formatTimestamp(metadata.timestamp),
    ':tree': omitEmpty(metadata.treeSHA),
  });
}

/**
 * Serialize metadata as a YAML document: the fields common to every provider
 * in a fixed order, followed by the provider's own fields.
 */
export function marshalYAML(metadata: Metadata): string {
  try {
    let out = stringify(universalFields(metadata), STRINGIFY_OPTIONS);
    if (Object.keys(metadata.provider.fields).length > 0) {
      out += stringify(metadata.provider.fields, STRINGIFY_OPTIONS);
    }
    return out;
  } catch (err) {
    throw new SerializationError(`unable to serialize metadata: ${describeError(err)}`, { cause: err });
  }
}
