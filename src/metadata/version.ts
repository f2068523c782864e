// Metadata format versioning.

/** Format version this build reads and writes */
export const FORMAT_VERSION = '0.2.0';

/**
 * Whether a snapshot written by `found` may be rewritten by `current`.
 *
 * Both must be `major.minor.patch`. Majors must match; while the major is 0,
 * minors must match too.
 */
export function versionsAreCompatible(found: string, current: string): boolean {
  const parse = (v: string): [number, number] | null => {
    const parts = v.trim().split('.');
    if (parts.length !== 3) return null;
    const [major, minor] = parts.map((p) => (/^\d+$/.test(p) ? Number(p) : NaN));
    if (major === undefined || minor === undefined || Number.isNaN(major) || Number.isNaN(minor)) {
      return null;
    }
    return [major, minor];
  };

  const f = parse(found);
  const c = parse(current);
  if (!f || !c) return false;

  if (f[0] !== c[0]) return false;
  if (c[0] === 0 && f[1] !== c[1]) return false;
  return true;
}
