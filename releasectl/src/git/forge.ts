export type RemoteLocation = {
  host: string;
  /** Repository path without leading slash or `.git`, e.g. `acme/widgets`. */
  repoPath: string;
};

const SCP_LIKE = /^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/;

function cleanPath(p: string): string {
  return p.replace(/^\/+/, "").replace(/\/+$/, "").replace(/\.git$/, "");
}

/**
 * Parse a git remote URL. Handles scp-like (`git@host:org/repo.git`),
 * `ssh://`, `git://` and `http(s)://` forms.
 */
export function parseRemoteUrl(url: string): RemoteLocation | null {
  const trimmed = url.trim();
  if (trimmed === "") return null;

  if (!trimmed.includes("://")) {
    const m = SCP_LIKE.exec(trimmed);
    if (!m) return null;
    const repoPath = cleanPath(m[2]);
    return repoPath.includes("/") ? { host: m[1], repoPath } : null;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }
  if (!["ssh:", "git:", "http:", "https:"].includes(parsed.protocol)) return null;
  const repoPath = cleanPath(decodeURIComponent(parsed.pathname));
  if (parsed.hostname === "" || !repoPath.includes("/")) return null;
  return { host: parsed.hostname, repoPath };
}

/**
 * Page where the release workflow triggered by the pushed tag can be watched.
 * `forgeUrl` replaces `https://<host>` for forges served elsewhere.
 */
export function actionsUrl(remoteUrl: string, forgeUrl?: string): string | null {
  const loc = parseRemoteUrl(remoteUrl);
  if (!loc) return null;
  const base = forgeUrl ? forgeUrl.replace(/\/+$/, "") : `https://${loc.host}`;
  return `${base}/${loc.repoPath}/actions`;
}
