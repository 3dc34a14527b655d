/**
 * Repository URL utilities
 */

import { ValidationError } from '../errors.js';
import { fail, ok, type RepoIdentity, type Result } from '../types.js';

export const DEFAULT_ACCEPTED_HOST = 'github.com';

// git@github.com:owner/name.git
const SCP_LIKE_URL = /^[\w.-]+@([\w.-]+):(.+)$/;

function normalizeHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, '');
}

function toParsableUrl(url: string): string {
  const trimmed = url.trim();
  const scp = trimmed.match(SCP_LIKE_URL);
  if (scp && !trimmed.includes('://')) {
    return `ssh://${scp[1]}/${scp[2]}`;
  }
  return trimmed;
}

/**
 * Parse a repository URL into its identity. No network access.
 *
 * Parsing never fails: an unrecognized host only clears `hostAccepted`, and
 * missing path segments leave `owner`/`name` empty. Use `validateRepoUrl`
 * as the gate.
 *
 * @example
 * parseRepoUrl('https://github.com/acme/widgets') // owner 'acme', name 'widgets'
 * parseRepoUrl('https://github.com/acme')         // owner 'acme', name ''
 */
export function parseRepoUrl(url: string, acceptedHost: string = DEFAULT_ACCEPTED_HOST): RepoIdentity {
  let parsed: URL;
  try {
    parsed = new URL(toParsableUrl(url));
  } catch {
    return { url, host: '', owner: '', name: '', hostAccepted: false };
  }

  const host = normalizeHost(parsed.hostname);
  const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);

  const owner = segments[0] ?? '';
  const name = (segments[1] ?? '').replace(/\.git$/, '');

  return {
    url,
    host,
    owner,
    name,
    hostAccepted: host.length > 0 && host === normalizeHost(acceptedHost),
  };
}

/**
 * Resolve a URL to an identity, or explain why it cannot be mirrored.
 */
export function resolveRepoUrl(
  url: string,
  acceptedHost: string = DEFAULT_ACCEPTED_HOST
): Result<RepoIdentity, ValidationError> {
  if (!url || !url.trim()) {
    return fail(new ValidationError('Repository URL is required', url));
  }

  const identity = parseRepoUrl(url, acceptedHost);

  if (!identity.host) {
    return fail(new ValidationError(`Not a valid URL: ${url}`, url));
  }
  if (!identity.hostAccepted) {
    return fail(new ValidationError(`Unsupported host "${identity.host}" (expected ${acceptedHost})`, url));
  }
  if (!identity.owner || !identity.name) {
    return fail(new ValidationError(`URL must name both an owner and a repository: ${url}`, url));
  }

  return ok(identity);
}

export function validateRepoUrl(url: string, acceptedHost: string = DEFAULT_ACCEPTED_HOST): boolean {
  return resolveRepoUrl(url, acceptedHost).success;
}
