import semver from "semver";

const PEP440_PRE: Record<string, string> = {
  a: "alpha",
  alpha: "alpha",
  b: "beta",
  beta: "beta",
  c: "rc",
  rc: "rc",
  pre: "rc",
  preview: "rc",
};

// release segment plus an optional a/b/rc pre-release, e.g. 1.2.3rc1
const PEP440 = /^v?(\d+)\.(\d+)(?:\.(\d+))?(?:[-_.]?(a|alpha|b|beta|c|rc|pre|preview)[-_.]?(\d*))?$/i;

/**
 * Map a version onto semver so versions written by uv (PEP 440) and npm can
 * be ordered with one comparator. Returns null for forms with no faithful
 * mapping (epochs, post and dev releases, local labels).
 */
export function toSemver(version: string): string | null {
  const direct = semver.valid(version);
  if (direct) return direct;

  const m = PEP440.exec(version.trim());
  if (!m) return null;
  const [, major, minor, patch, pre, preNum] = m;
  const release = `${Number(major)}.${Number(minor)}.${Number(patch ?? "0")}`;
  if (!pre) return release;
  return `${release}-${PEP440_PRE[pre.toLowerCase()]}.${preNum === "" ? 0 : Number(preNum)}`;
}

export type OrderCheck =
  | { comparable: false }
  | { comparable: true; ok: true }
  | { comparable: true; ok: false; message: string };

const STABLE_KEYWORDS = new Set(["major", "minor", "patch"]);

/**
 * Check that `next` is a strict successor of `current` and, for the
 * major/minor/patch keywords applied to a stable version, that the expected
 * field moved.
 */
export function checkBumpOrder(keyword: string, current: string, next: string): OrderCheck {
  const from = toSemver(current);
  const to = toSemver(next);
  if (!from || !to) return { comparable: false };

  if (!semver.gt(to, from)) {
    return { comparable: true, ok: false, message: `${next} does not come after ${current}` };
  }

  if (STABLE_KEYWORDS.has(keyword) && semver.prerelease(from) === null && semver.prerelease(to) === null) {
    const moved = semver.diff(from, to);
    if (moved !== keyword) {
      return {
        comparable: true,
        ok: false,
        message: `'${keyword}' bump from ${current} produced a ${moved ?? "no"} change (${next})`,
      };
    }
  }

  return { comparable: true, ok: true };
}
