export interface CodeRef {
  repoUrl: string;
  ref?: string;
}

const URL_PREFIX = /^(https?:\/\/|ssh:\/\/|file:\/\/|git@)/i;
const REPO_SLUG = /^[\w.-]+\/[\w.-]+$/;

/**
 * Accepts `<git url>[#ref]` or a GitHub `owner/repo[#ref]` slug.
 */
export function parseCodeRef(value: string): CodeRef | undefined {
  const trimmed = value.trim();
  const hashIndex = trimmed.lastIndexOf('#');
  const location = hashIndex >= 0 ? trimmed.slice(0, hashIndex) : trimmed;
  const ref = hashIndex >= 0 ? trimmed.slice(hashIndex + 1).trim() : '';

  let repoUrl: string | undefined;
  if (URL_PREFIX.test(location)) {
    repoUrl = location;
  } else if (REPO_SLUG.test(location)) {
    repoUrl = `https://github.com/${location}.git`;
  }
  if (!repoUrl || /\s/.test(repoUrl)) {
    return undefined;
  }
  return ref ? { repoUrl, ref } : { repoUrl };
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
